/**
 * @openassoc/core
 *
 * Shared plumbing for every package: structured logger, error taxonomy and
 * configuration loader.
 */

// Configuration loader and schema
export * from './config/index.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/logger.js';
