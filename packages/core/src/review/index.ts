export * from './circuit-breaker';
export * from './reviewer';
