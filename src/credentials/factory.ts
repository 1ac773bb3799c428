/**
 * Credential store factory.
 *
 * Provides:
 * - normalizeStoreName(): Normalize aliases ('keyring' → 'secret-tool')
 * - openStore(): Open a backend, or null when it cannot be used
 */

import { AppError, ErrorCode } from '../errors/types';
import { describeError } from '../errors/handler';
import { logger } from '../utils/logger';
import { FileWalletStore } from './file-store';
import { SecretToolStore, secretToolAvailable } from './secret-tool';
import type { CredentialStore } from './types';

/** Backends that can be chosen from the command line. */
export type StoreBackend = 'file' | 'secret-tool' | 'none';

export interface StoreOptions {
  walletFile: string;
}

/**
 * Normalize backend name aliases.
 *   'wallet' → 'file'
 *   'secret-service' | 'keyring' → 'secret-tool'
 *   'off' → 'none'
 */
export function normalizeStoreName(name: string): StoreBackend {
  const normalized = name.trim().toLowerCase();
  switch (normalized) {
    case 'file':
    case 'wallet':
      return 'file';
    case 'secret-tool':
    case 'secret-service':
    case 'keyring':
      return 'secret-tool';
    case 'none':
    case 'off':
      return 'none';
    default:
      throw new AppError(`Unknown credential store: ${name}`, ErrorCode.VALIDATION_ERROR, { store: name });
  }
}

async function createStore(backend: Exclude<StoreBackend, 'none'>, options: StoreOptions): Promise<CredentialStore> {
  switch (backend) {
    case 'file':
      return FileWalletStore.open(options.walletFile);
    case 'secret-tool':
      if (!(await secretToolAvailable())) {
        throw new AppError('secret-tool is not installed', ErrorCode.STORE_UNAVAILABLE, { store: backend });
      }
      return new SecretToolStore();
  }
}

/**
 * Open a credential store. Failing to open one is a normal outcome: the
 * caller falls back to asking the user, so this resolves to null instead
 * of rejecting.
 */
export async function openStore(backend: StoreBackend, options: StoreOptions): Promise<CredentialStore | null> {
  if (backend === 'none') {
    logger.debug('Credential store disabled');
    return null;
  }

  try {
    const store = await createStore(backend, options);
    logger.debug(`Opened ${store.name} credential store`);
    return store;
  } catch (error) {
    logger.debug(`Credential store ${backend} unavailable: ${describeError(error)}`);
    return null;
  }
}
