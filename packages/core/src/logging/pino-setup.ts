/**
 * Pino logger setup with redaction of credentials.
 *
 * The root logger writes to stderr and is silent until a caller raises the
 * level (the CLI does this for `--verbose`).
 */

import pino from 'pino';

/**
 * Paths censored before anything reaches the log stream.
 *
 * Covers the credential fields of the config file and the auth headers the
 * KV client sends.
 * @public
 */
const REDACT_PATHS = [
  'api_token',
  '*.api_token',
  'api_key',
  '*.api_key',
  'token',
  '*.token',
  'authorization',
  '*.authorization',
  'headers.Authorization',
  '*.headers.Authorization',
  'headers["X-Auth-Key"]',
  '*.headers["X-Auth-Key"]',
  '*.secret',
  '*.credential',
];

/**
 * Creates a logger with the kvctl redaction rules.
 * @param destination - Stream to write to (defaults to stderr)
 * @public
 */
export function createRootLogger(
  destination: pino.DestinationStream = pino.destination(2),
): pino.Logger {
  return pino(
    {
      level: 'silent',
      redact: {
        paths: REDACT_PATHS,
        censor: '[REDACTED]',
        remove: false,
      },
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    destination,
  );
}

/**
 * Process-wide logger instance.
 *
 * @example
 * ```typescript
 * rootLogger.level = 'debug';
 * rootLogger.debug({ headers: { Authorization: 'Bearer x' } }); // redacted
 * ```
 * @public
 */
export const rootLogger = createRootLogger();
