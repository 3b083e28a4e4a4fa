export * from './types.js';
export * from './config.js';
export * from './logger.js';
export * from './errors.js';
export { getDb, closeDb, type Database, type DbExecutor } from './db/index.js';
export { withRetry, isRetryableError, type RetryOptions } from './retry.js';
