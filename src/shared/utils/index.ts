/**
 * Shared Utilities
 */

export { logger, Logger, LogLevel, parseLogLevel } from './logger';
export type { LogMeta } from './logger';
export { generateId } from './uuid';
export { errorMessage, toError } from './errors';
export { KeyedMutex } from './keyed-mutex';
export { parseJson } from './json';
