export const name = '@crucible/shared';

export * from './types/events';
export * from './types/llm';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './lru-cache';
export * from './json-utils';
export * from './concurrency';
export * from './config/schema';
