import { AppError, ErrorCode } from '../errors/types';
import type { CredentialStore, StoreName } from './types';

/**
 * Folder selection and close bookkeeping shared by every store.
 */
export abstract class BaseCredentialStore implements CredentialStore {
  abstract readonly name: StoreName;

  private selected: string | null = null;
  private closed = false;

  abstract hasFolder(folder: string): Promise<boolean>;
  abstract createFolder(folder: string): Promise<void>;
  abstract read(key: string): Promise<string | null>;
  abstract write(key: string, value: string): Promise<void>;
  abstract rename(oldKey: string, newKey: string): Promise<void>;
  abstract remove(key: string): Promise<boolean>;

  async selectFolder(folder: string): Promise<void> {
    this.ensureOpen();
    this.selected = folder;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.selected = null;
  }

  protected ensureOpen(): void {
    if (this.closed) {
      throw new AppError(`${this.name} store is closed`, ErrorCode.STORE_CLOSED, { store: this.name });
    }
  }

  /** The selected folder; throws when none is selected or the store is closed. */
  protected currentFolder(): string {
    this.ensureOpen();
    if (this.selected === null) {
      throw new AppError('No folder selected', ErrorCode.NO_FOLDER_SELECTED, { store: this.name });
    }
    return this.selected;
  }
}
