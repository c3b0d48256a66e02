import { appendFileSync, mkdirSync } from 'fs';
import { join, resolve } from 'path';
import { getUserDir } from './paths.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

/**
 * Type guard for LogLevel strings.
 * @param value - Candidate level name
 * @internal
 */
function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

/**
 * Reads the current log level from KVCTL_LOG_LEVEL environment variable.
 * Defaults to 'info' if not set or invalid.
 * @internal
 */
function currentLevel(): LogLevel {
  const env = (process.env.KVCTL_LOG_LEVEL || '').toLowerCase();
  if (env && isLogLevel(env)) {
    return env;
  }
  return 'info';
}

/**
 * Checks if logging is enabled for a given level based on current configuration.
 * @param min - Minimum log level to check
 * @internal
 */
function enabled(min: LogLevel): boolean {
  const lvl = currentLevel();
  return LEVELS[lvl] >= LEVELS[min];
}

/**
 * Gets or generates a stable per-process run identifier for log correlation.
 * @internal
 */
function runId(): string {
  if (!process.env.KVCTL_RUN_ID) {
    process.env.KVCTL_RUN_ID = `${Date.now()}-${process.pid}`;
  }
  return process.env.KVCTL_RUN_ID;
}

/**
 * Directory holding the JSON Lines event logs.
 *
 * KVCTL_LOG_DIR wins; otherwise `logs/` below the user directory.
 * @public
 */
export function getLogDir(): string {
  const override = process.env.KVCTL_LOG_DIR;
  if (override && override.trim()) return resolve(override);
  return join(getUserDir(), 'logs');
}

/**
 * Path of the main JSON Lines log file for the current run.
 * @public
 */
export function getLogFilePath(): string {
  return join(getLogDir(), `run-${runId()}.jsonl`);
}

/**
 * Writes a structured log event to the JSON Lines log file.
 *
 * Respects both the KVCTL_LOG enable flag and KVCTL_LOG_LEVEL threshold.
 * Error-level events are always logged regardless of configuration.
 * @param level - Log severity level
 * @param event - Event identifier, e.g. `kv:key-put:done`
 * @param data - Optional structured data to include
 * @public
 */
export function logEvent(level: LogLevel, event: string, data?: unknown): void {
  const loggingEnabled =
    process.env.KVCTL_LOG === '1' ||
    process.env.KVCTL_LOG === 'true' ||
    level === 'error';
  if (!loggingEnabled) return;

  if (level !== 'error' && !enabled(level)) return;

  const entry = {
    ts: new Date().toISOString(),
    pid: process.pid,
    level,
    event,
    data,
  };
  try {
    mkdirSync(getLogDir(), { recursive: true });
    appendFileSync(getLogFilePath(), JSON.stringify(entry) + '\n', {
      encoding: 'utf8',
    });
  } catch {
    // Avoid throwing from logger
  }
}

/**
 * Logs an error event with context for debugging.
 *
 * Captures message, stack, error name, process arguments and working directory.
 * @param context - Label identifying where the error occurred
 * @param rawError - The error object or value that was thrown
 * @param extra - Additional structured context
 * @public
 */
export function logError(
  context: string,
  rawError: unknown,
  extra?: unknown,
): void {
  const err = rawError instanceof Error ? rawError : undefined;
  logEvent('error', `error:${context}`, {
    message: err?.message ?? String(rawError),
    name: err?.name,
    stack: err?.stack,
    extra,
    argv: process.argv,
    cwd: process.cwd(),
  });
}

/**
 * Minimal logging seam for code that writes human-facing diagnostics.
 * @public
 */
export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(
    message: string,
    error?: unknown,
    context?: Record<string, unknown>,
  ): void;
}

/**
 * Console-based logger with a fixed prefix.
 *
 * Everything goes to stderr so that stdout stays free for command output
 * and for the MCP stdio transport.
 * @public
 */
export class ConsoleLogger implements ILogger {
  public constructor(private prefix: string = '[kvctl]') {}

  public debug(message: string, context?: Record<string, unknown>): void {
    this.write(message, context);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.write(message, context);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.write(message, context);
  }

  public error(
    message: string,
    error?: unknown,
    context?: Record<string, unknown>,
  ): void {
    const errorContext =
      error === undefined
        ? {}
        : { error: error instanceof Error ? error.message : String(error) };
    this.write(message, { ...context, ...errorContext });
  }

  private write(message: string, context?: Record<string, unknown>): void {
    if (context && Object.keys(context).length > 0) {
      console.error(`${this.prefix} ${message}`, context);
    } else {
      console.error(`${this.prefix} ${message}`);
    }
  }
}
