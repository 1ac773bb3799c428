/**
 * Credential store module.
 *
 * Barrel export for store types, backends, and the factory.
 */

export type { CredentialStore, StoreName } from './types';

export { BaseCredentialStore } from './base';
export { FileWalletStore } from './file-store';
export { SecretToolStore, SecretToolError, runSecretTool, secretToolAvailable } from './secret-tool';
export { MemoryStore } from './memory';

export { normalizeStoreName, openStore } from './factory';
export type { StoreBackend, StoreOptions } from './factory';
