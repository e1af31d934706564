import type { ISecretStore } from './types.js';

/**
 * Process-local {@link ISecretStore}; contents are lost on exit.
 * @public
 */
export class MemorySecretStore implements ISecretStore {
  private readonly entries = new Map<string, string>();

  public async get(namespace: string, key: string): Promise<string | null> {
    return this.entries.get(MemorySecretStore.slot(namespace, key)) ?? null;
  }

  public async set(namespace: string, key: string, value: string): Promise<void> {
    this.entries.set(MemorySecretStore.slot(namespace, key), value);
  }

  public async delete(namespace: string, key: string): Promise<void> {
    this.entries.delete(MemorySecretStore.slot(namespace, key));
  }

  private static slot(namespace: string, key: string): string {
    return `${namespace}:${key}`;
  }
}
