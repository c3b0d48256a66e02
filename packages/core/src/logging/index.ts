/**
 * Logging infrastructure exports
 *
 * Structured stderr logging with redaction via pino, plus the JSON Lines
 * event log.
 */

export { rootLogger, createRootLogger } from './pino-setup.js';

export {
  logEvent,
  logError,
  getLogDir,
  getLogFilePath,
  ConsoleLogger,
} from '../logger.js';
export type { LogLevel, ILogger } from '../logger.js';
