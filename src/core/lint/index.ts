export * from './types.js';
export * from './advisory-engine.js';
export * from './fix-engine.js';
export * from './pipeline.js';
export * from './spark-linter.js';
