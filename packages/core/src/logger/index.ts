// Logger factory for dependency injection
export { createLogger } from './factory.js';
export type { CreateLoggerOptions } from './factory.js';

// Multi-transport logger
export * from './types.js';
export * from './schemas.js';
export * from './logger.js';
export * from './errors.js';
export * from './error-codes.js';
export * from './transport-factory.js';
export * from './transports/console-transport.js';
export * from './transports/file-transport.js';
export * from './transports/silent-transport.js';
