export * from './candidate';
export * from './pool';
export * from './selector';
export * from './text-generator';
export * from './generator';
export * from './blackboard';
export * from './correction';
