import { AppError, ErrorCode } from '../errors/types';
import { BaseCredentialStore } from './base';

/**
 * Process-local store. Nothing survives the process.
 */
export class MemoryStore extends BaseCredentialStore {
  readonly name = 'memory' as const;
  private readonly folders = new Map<string, Map<string, string>>();

  constructor(initial: Record<string, Record<string, string>> = {}) {
    super();
    for (const [folder, entries] of Object.entries(initial)) {
      this.folders.set(folder, new Map(Object.entries(entries)));
    }
  }

  async hasFolder(folder: string): Promise<boolean> {
    this.ensureOpen();
    return this.folders.has(folder);
  }

  async createFolder(folder: string): Promise<void> {
    this.ensureOpen();
    if (!this.folders.has(folder)) {
      this.folders.set(folder, new Map());
    }
  }

  async read(key: string): Promise<string | null> {
    return this.entries().get(key) ?? null;
  }

  async write(key: string, value: string): Promise<void> {
    this.entries().set(key, value);
  }

  async rename(oldKey: string, newKey: string): Promise<void> {
    const entries = this.entries();
    const value = entries.get(oldKey);
    if (value === undefined) {
      throw new AppError('No entry to rename', ErrorCode.ENTRY_NOT_FOUND, { identifier: oldKey });
    }
    entries.delete(oldKey);
    entries.set(newKey, value);
  }

  async remove(key: string): Promise<boolean> {
    return this.entries().delete(key);
  }

  /** Copy of a folder's entries, for assertions. */
  snapshot(folder: string): Record<string, string> {
    return Object.fromEntries(this.folders.get(folder) ?? []);
  }

  private entries(): Map<string, string> {
    const folder = this.currentFolder();
    const entries = this.folders.get(folder);
    if (!entries) {
      throw new AppError(`Folder does not exist: ${folder}`, ErrorCode.STORE_READ_FAILED, { folder });
    }
    return entries;
  }
}
