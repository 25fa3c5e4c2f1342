export * from './result';
export * from './pipeline';
export * from './factory';
