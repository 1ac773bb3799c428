/**
 * Wallet file store.
 *
 * Keeps every folder in a single JSON document:
 *
 *   { "version": 1, "folders": { "<folder>": { "<identifier>": "<secret>" } } }
 *
 * The document is loaded into maps once when the store is opened, so any
 * string is a usable key, `__proto__` included. Each mutation
 * rewrites it atomically (unique temp file, then rename) with owner-only
 * permissions, the same way session files are written.
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { randomBytes } from 'crypto';

import { AppError, ErrorCode } from '../errors/types';
import { describeError } from '../errors/handler';
import { logger } from '../utils/logger';
import { BaseCredentialStore } from './base';

const WALLET_VERSION = 1;

interface WalletData {
  version: number;
  folders: Record<string, Record<string, string>>;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((entry) => typeof entry === 'string')
  );
}

function isWalletData(value: unknown): value is WalletData {
  if (typeof value !== 'object' || value === null) return false;
  const version: unknown = Reflect.get(value, 'version');
  const folders: unknown = Reflect.get(value, 'folders');
  return (
    version === WALLET_VERSION &&
    typeof folders === 'object' &&
    folders !== null &&
    !Array.isArray(folders) &&
    Object.values(folders).every(isStringRecord)
  );
}

type Folders = Map<string, Map<string, string>>;

function toFolders(data: WalletData): Folders {
  return new Map(
    Object.entries(data.folders).map(([folder, entries]) => [folder, new Map(Object.entries(entries))]),
  );
}

function toWalletData(folders: Folders): WalletData {
  return {
    version: WALLET_VERSION,
    folders: Object.fromEntries([...folders].map(([folder, entries]) => [folder, Object.fromEntries(entries)])),
  };
}

export class FileWalletStore extends BaseCredentialStore {
  readonly name = 'file' as const;

  private constructor(
    private readonly filePath: string,
    private readonly folders: Folders,
  ) {
    super();
  }

  /**
   * Open the wallet at filePath. A missing file is an empty wallet; an
   * unreadable or malformed one fails with STORE_UNAVAILABLE.
   */
  static async open(filePath: string): Promise<FileWalletStore> {
    if (!(await fs.pathExists(filePath))) {
      logger.debug(`Wallet file ${filePath} does not exist yet`);
      return new FileWalletStore(filePath, new Map());
    }

    let parsed: unknown;
    try {
      parsed = await fs.readJson(filePath);
    } catch (error) {
      throw new AppError(
        `Failed to read wallet: ${describeError(error)}`,
        ErrorCode.STORE_UNAVAILABLE,
        { store: 'file', path: filePath },
      );
    }

    if (!isWalletData(parsed)) {
      throw new AppError('Wallet file is corrupted or invalid', ErrorCode.STORE_UNAVAILABLE, {
        store: 'file',
        path: filePath,
      });
    }

    return new FileWalletStore(filePath, toFolders(parsed));
  }

  async hasFolder(folder: string): Promise<boolean> {
    this.ensureOpen();
    return this.folders.has(folder);
  }

  async createFolder(folder: string): Promise<void> {
    if (await this.hasFolder(folder)) return;
    this.folders.set(folder, new Map());
    await this.save();
  }

  async read(key: string): Promise<string | null> {
    return this.entries().get(key) ?? null;
  }

  async write(key: string, value: string): Promise<void> {
    this.entries().set(key, value);
    await this.save();
  }

  async rename(oldKey: string, newKey: string): Promise<void> {
    const entries = this.entries();
    const value = entries.get(oldKey);
    if (value === undefined) {
      throw new AppError('No entry to rename', ErrorCode.ENTRY_NOT_FOUND, { identifier: oldKey });
    }
    entries.delete(oldKey);
    entries.set(newKey, value);
    await this.save();
  }

  async remove(key: string): Promise<boolean> {
    if (!this.entries().delete(key)) return false;
    await this.save();
    return true;
  }

  private entries(): Map<string, string> {
    const folder = this.currentFolder();
    const entries = this.folders.get(folder);
    if (!entries) {
      throw new AppError(`Folder does not exist: ${folder}`, ErrorCode.STORE_READ_FAILED, { folder });
    }
    return entries;
  }

  private async save(): Promise<void> {
    const dir = path.dirname(this.filePath);
    const suffix = `${process.pid}-${randomBytes(4).toString('hex')}`;
    const tmpFile = `${this.filePath}.tmp-${suffix}`;

    try {
      await fs.ensureDir(dir, { mode: 0o700 });
      await fs.writeJson(tmpFile, toWalletData(this.folders), { spaces: 2, mode: 0o600 });
      await fs.move(tmpFile, this.filePath, { overwrite: true });
    } catch (error) {
      // Don't leave a copy of the secrets behind
      await fs.remove(tmpFile).catch((cleanupError: unknown) => {
        logger.debug(`Failed to remove ${tmpFile}: ${describeError(cleanupError)}`);
      });
      throw new AppError(
        `Failed to save wallet: ${describeError(error)}`,
        ErrorCode.STORE_WRITE_FAILED,
        { store: 'file', path: this.filePath },
      );
    }
  }
}
