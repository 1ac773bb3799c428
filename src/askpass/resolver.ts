/**
 * Stored-credential lookup and write-back.
 *
 * Older releases stored entries under non-canonical keys: the identifier
 * in single quotes, or with a trailing space, or both. A lookup that
 * misses the canonical key probes those forms and moves the first hit
 * to the canonical key, so each credential ends up with a single entry.
 */

import { describeError } from '../errors/handler';
import type { CredentialStore } from '../credentials/types';
import { logger } from '../utils/logger';
import type { Classification } from './types';

/**
 * Historical key forms of an identifier, in probe order.
 */
export function legacyKeyVariants(identifier: string): string[] {
  return [`'${identifier}'`, `${identifier} `, `'${identifier}' `];
}

function isPresent(secret: string | null): secret is string {
  return secret !== null && secret.length > 0;
}

async function lookup(store: CredentialStore, identifier: string, folder: string): Promise<string | null> {
  if (!(await store.hasFolder(folder))) {
    logger.debug(`Folder ${folder} not found in ${store.name} store`);
    return null;
  }

  await store.selectFolder(folder);

  const secret = await store.read(identifier);
  if (isPresent(secret)) {
    return secret;
  }

  for (const legacyKey of legacyKeyVariants(identifier)) {
    const legacySecret = await store.read(legacyKey);
    if (!isPresent(legacySecret)) continue;

    logger.warn(`Detected legacy key for ${identifier}, enabling workaround`);
    try {
      await store.rename(legacyKey, identifier);
    } catch (error) {
      // The secret was read; migrating it can wait for the next lookup
      logger.warn(`Failed to migrate legacy key for ${identifier}: ${describeError(error)}`);
    }
    return legacySecret;
  }

  return null;
}

/**
 * Find a stored secret for a classified prompt.
 *
 * Resolves to null, without touching the store, when there is no store,
 * no identifier, or the prompt forbids reuse. Store failures also resolve
 * to null: the caller then asks the user.
 */
export async function resolveCredential(
  classification: Classification,
  store: CredentialStore | null,
  folder: string,
): Promise<string | null> {
  const { identifier, allowStoreLookup } = classification;
  if (!store || identifier === null || !allowStoreLookup) {
    return null;
  }

  try {
    return await lookup(store, identifier, folder);
  } catch (error) {
    logger.warn(`Credential lookup failed: ${describeError(error)}`);
    return null;
  }
}

/**
 * Remember a freshly entered secret under its identifier, creating the
 * folder on first use. Rejects when the store fails.
 */
export async function storeCredential(
  identifier: string,
  secret: string,
  store: CredentialStore,
  folder: string,
): Promise<void> {
  if (!(await store.hasFolder(folder))) {
    await store.createFolder(folder);
  }
  await store.selectFolder(folder);
  await store.write(identifier, secret);
}
