/**
 * Main entry point for the error management system
 * Exports core types and utilities for error handling
 */

export { CubbyBaseError } from './CubbyBaseError.js';
export { CubbyRuntimeError } from './CubbyRuntimeError.js';
export { CubbyValidationError } from './CubbyValidationError.js';
export { ErrorScope, ErrorType } from './types.js';
export type { CubbyErrorCode, Issue, Severity } from './types.js';
export { ensureOk } from './result-bridge.js';
