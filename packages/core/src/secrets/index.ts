export type { ISecretStore } from './types.js';
export { MemorySecretStore } from './memory-secret-store.js';
export { KeychainSecretStore } from './keychain-secret-store.js';
export type { KeychainSecretStoreOptions } from './keychain-secret-store.js';
