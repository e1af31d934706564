import { createHash } from 'crypto';

/**
 * Generate a filesystem-safe file name for a keychain account using SHA-256
 * @param account - The `service:namespace:key` account string
 * @internal
 */
export function getFilename(account: string): string {
  const hash = createHash('sha256').update(account).digest('hex');
  return `secret-${hash.substring(0, 16)}`;
}
