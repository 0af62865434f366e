/**
 * @edit-assist/utils
 * 
 * Shared utilities package containing:
 * - Structured logger
 * - Type guards
 */

// Type guards
export {
  isString,
  isNonEmptyString,
  isDefined,
  isDigitString,
} from './guards.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
