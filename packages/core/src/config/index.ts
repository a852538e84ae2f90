export { ConfigErrorCode } from './error-codes.js';
export { ConfigError } from './errors.js';
