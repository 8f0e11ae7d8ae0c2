/**
 * Utility Functions
 */

export { createLogger, getLogLevel, type Logger, type LogLevel } from './logger.js';
