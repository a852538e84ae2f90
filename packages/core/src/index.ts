/**
 * @cubby/core - Main entry point
 *
 * Contracts shared by every cubby package: errors, logger, storage interfaces.
 */

// Errors
export * from './errors/index.js';

// Configuration errors
export * from './config/index.js';

// Logger
export * from './logger/index.js';

// Storage contracts
export * from './storage/index.js';

// Utils
export * from './utils/index.js';
