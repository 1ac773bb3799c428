/**
 * Credential store types and interfaces.
 *
 * A store keeps `identifier → secret` entries inside named folders. The
 * resolver works against this interface only, so every backend (wallet
 * file, Secret Service, the in-memory store used by tests) is
 * interchangeable.
 */

export type StoreName = 'file' | 'secret-tool' | 'memory';

export interface CredentialStore {
  readonly name: StoreName;

  hasFolder(folder: string): Promise<boolean>;

  /** Scope the entry operations below to a folder. */
  selectFolder(folder: string): Promise<void>;

  createFolder(folder: string): Promise<void>;

  /** Secret stored under key in the selected folder, or null when absent. */
  read(key: string): Promise<string | null>;

  write(key: string, value: string): Promise<void>;

  /** Move an entry to a new key, replacing whatever the new key held. */
  rename(oldKey: string, newKey: string): Promise<void>;

  /** Returns false when there was nothing to remove. */
  remove(key: string): Promise<boolean>;

  /** Release the handle. Any later call fails. */
  close(): Promise<void>;
}
