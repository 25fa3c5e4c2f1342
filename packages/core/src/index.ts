export const name = '@crucible/core';

export * from './config/loader';
export * from './cost/tracker';
export * from './cost/proxy';
export * from './registry';
export * from './validation';
export * from './generation';
export * from './review';
export * from './outcomes';
export * from './pipeline';
