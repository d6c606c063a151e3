/**
 * skelly - project scaffolding from templates.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Template engine
export * from './core/templates/index.js';

// Project listing
export * from './core/projects/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
