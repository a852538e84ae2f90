export * from './result.js';
export * from './env.js';
