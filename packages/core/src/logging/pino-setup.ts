/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Uses fast-redact (through pino's `redact` option) for path-based redaction of
 * OAuth secrets. The level comes from BANDKIT_LOG_LEVEL and defaults to
 * 'silent', so a library consumer sees nothing unless they opt in.
 */

import pino from 'pino';

/**
 * Levels accepted in BANDKIT_LOG_LEVEL
 * @public
 */
export const PINO_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

export type PinoLevel = (typeof PINO_LEVELS)[number];

/**
 * Paths censored in every log line.
 *
 * Only a top-level `code` is the authorization code; nested `code` fields
 * such as `err.code` carry error codes and stay readable.
 * @public
 */
export const REDACTED_PATHS = [
  'access_token',
  '*.access_token',
  'accessToken',
  '*.accessToken',
  'client_secret',
  '*.client_secret',
  'clientSecret',
  '*.clientSecret',
  'code',
  'authorization',
  '*.authorization',
  'password',
  '*.password',
  'token',
  '*.token',
];

function isPinoLevel(value: string): value is PinoLevel {
  return (PINO_LEVELS as readonly string[]).includes(value);
}

/**
 * Reads the log level from the environment.
 * @param env - Environment to read, defaults to process.env
 * @returns The configured level, or 'silent' when unset or unknown
 * @public
 */
export function resolveLogLevel(
  env: Record<string, string | undefined> = process.env,
): PinoLevel {
  const configured = (env.BANDKIT_LOG_LEVEL ?? '').trim().toLowerCase();
  return isPinoLevel(configured) ? configured : 'silent';
}

/**
 * Builds the pino options shared by the root logger and the tests.
 * @param level - Minimum level to emit
 * @public
 */
export function createLoggerOptions(level: PinoLevel): pino.LoggerOptions {
  return {
    name: 'bandkit',
    level,
    redact: {
      paths: REDACTED_PATHS,
      censor: '[REDACTED]',
      remove: false, // Keep the keys, just redact values
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
  };
}

/**
 * Root logger instance with automatic redaction of sensitive data.
 *
 * @example
 * ```typescript
 * import { rootLogger } from './pino-setup.js';
 *
 * rootLogger.level = 'info';
 * rootLogger.info({ access_token: 'abc' }); // Logs: { access_token: '[REDACTED]' }
 * ```
 * @public
 */
const rootLogger = pino(createLoggerOptions(resolveLogLevel()));

export { rootLogger };
