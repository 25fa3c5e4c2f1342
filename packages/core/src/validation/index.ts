export * from './types';
export * from './rules';
export * from './runner';
export * from './cache';
export * from './profiles';
