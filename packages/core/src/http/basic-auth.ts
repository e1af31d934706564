import type { BasicAuthCredentials } from './types.js';

/**
 * Builds an HTTP Basic `Authorization` header value.
 * @example
 * ```typescript
 * buildBasicAuthHeader({ username: 'client', password: 'secret' });
 * // 'Basic Y2xpZW50OnNlY3JldA=='
 * ```
 * @public
 */
export function buildBasicAuthHeader(credentials: BasicAuthCredentials): string {
  const encoded = Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64');
  return `Basic ${encoded}`;
}
