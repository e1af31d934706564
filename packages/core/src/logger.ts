import { rootLogger } from './logging/pino-setup.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Writes a structured log event through the root logger.
 *
 * The event name becomes both the `event` field and the message, so log lines
 * can be filtered by namespace (`auth:*`, `http:*`, `client:*`, `secrets:*`).
 * Sensitive fields in `data` are censored by the logger's redaction paths.
 * @param level - Log severity level
 * @param event - Event identifier for categorization
 * @param data - Optional structured data to include
 * @public
 */
export function logEvent(
  level: LogLevel,
  event: string,
  data?: Record<string, unknown>,
): void {
  rootLogger[level]({ event, ...data }, event);
}

/**
 * Logs an error event with its stack and a free-form context payload.
 * @param context - Label identifying where the error occurred
 * @param rawError - The thrown value
 * @param extra - Additional structured context to aid debugging
 * @public
 */
export function logError(
  context: string,
  rawError: unknown,
  extra?: Record<string, unknown>,
): void {
  const err = rawError instanceof Error ? rawError : new Error(String(rawError));
  rootLogger.error({ event: `error:${context}`, err, extra }, `error:${context}`);
}
