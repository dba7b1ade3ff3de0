/**
 * Library exports.
 */

// Configuration
export * from './core/config/index.js';

// Engine
export * from './core/registry/index.js';
export * from './core/classify/index.js';
export * from './core/graph/index.js';
export * from './core/rules/index.js';
export * from './core/cycles/index.js';
export * from './core/metrics/index.js';
export * from './core/analysis/index.js';

// Source scanning
export * from './core/extraction/index.js';
export * from './core/discovery/index.js';

// Output
export * from './cli/formatters/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
