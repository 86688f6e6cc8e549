/**
 * spark-migrate: lint and rewrite PySpark code for Unity Catalog migration.
 * Main library exports barrel file.
 */

// Python parsing
export * from './python/index.js';

// Configuration
export * from './core/config/index.js';

// Session and migration lookup
export * from './core/session/index.js';
export * from './core/migration/index.js';

// Call patterns and embedded SQL
export * from './core/patterns/index.js';
export * from './core/sql/index.js';

// Linting and fixing
export * from './core/lint/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
