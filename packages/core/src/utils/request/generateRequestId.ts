import { randomBytes } from 'crypto';

/**
 * Generates a request ID with embedded timestamp, used to correlate the log
 * events of one authorization flow or API call.
 *
 * Format: `[prefix_]timestamp_randomhex`
 * @param prefix - Optional prefix to namespace the request ID
 * @public
 */
export function generateRequestId(prefix?: string): string {
  const timestamp = Date.now();
  const randomSuffix = randomBytes(4).toString('hex');
  return `${prefix ? `${prefix}_` : ''}${timestamp}_${randomSuffix}`;
}
