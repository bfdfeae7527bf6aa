/**
 * @predictkit/utils - Shared utilities package
 *
 * Logger, error taxonomy and environment configuration.
 */

export { Logger, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

export * from './errors.js';

export * from './config/index.js';
