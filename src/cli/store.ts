import { openStore, type CredentialStore } from '../credentials';
import type { AskpassConfig } from '../config';
import { AppError, ErrorCode } from '../errors/types';
import { onShutdown } from '../utils/shutdown';

/**
 * Open the configured store and close it again on Ctrl+C or SIGTERM.
 */
export async function openConfiguredStore(config: AskpassConfig): Promise<CredentialStore | null> {
  const store = await openStore(config.store, { walletFile: config.walletFile });
  if (store) {
    onShutdown(() => store.close());
  }
  return store;
}

/**
 * Like openConfiguredStore, for commands that cannot do without a store.
 */
export async function requireStore(config: AskpassConfig): Promise<CredentialStore> {
  if (config.store === 'none') {
    throw new AppError(
      'This command needs a credential store (--store file or --store secret-tool)',
      ErrorCode.VALIDATION_ERROR,
      { store: config.store },
    );
  }

  const store = await openConfiguredStore(config);
  if (!store) {
    throw new AppError(`Cannot open ${config.store} store`, ErrorCode.STORE_UNAVAILABLE, { store: config.store });
  }
  return store;
}
