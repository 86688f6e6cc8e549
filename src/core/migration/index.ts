export * from './types.js';
export * from './migration-index.js';
export * from './resolver.js';
export * from './loader.js';
