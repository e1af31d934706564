/**
 * Opaque secret storage keyed by an application namestring.
 *
 * The authorization flow keeps exactly two entries per namespace:
 * `authorization_code` and `access_token`. Each (namespace, key) pair is a
 * single slot; writers replace, never merge.
 * @public
 */
export interface ISecretStore {
  /**
   * @returns The stored value, or null when the slot is empty
   */
  get(namespace: string, key: string): Promise<string | null>;

  set(namespace: string, key: string, value: string): Promise<void>;

  /**
   * Empties the slot; a missing entry is not an error
   */
  delete(namespace: string, key: string): Promise<void>;
}
