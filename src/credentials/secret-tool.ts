/**
 * Secret Service store.
 *
 * Wraps the libsecret `secret-tool` command so entries land in the
 * desktop keyring (GNOME Keyring, KeePassXC, KWallet's Secret Service
 * bridge). An entry is identified by three attributes:
 *
 *   application=keyring-askpass folder=<folder> key=<identifier>
 *
 * Folders have no existence of their own: a folder exists while it holds
 * at least one entry.
 *
 * Security:
 * - Uses execFile (not exec) to prevent shell injection
 * - 10-second timeout so a locked keyring cannot hang ssh forever
 * - Secrets are written via stdin, never as command-line arguments
 */

import { execFile } from 'child_process';

import { APP_NAME } from '../constants';
import { AppError, ErrorCode } from '../errors/types';
import { BaseCredentialStore } from './base';

const TIMEOUT_MS = 10_000;
const DEFAULT_BIN = 'secret-tool';

/** Exit status of lookup and search when no item matches. */
const NOT_FOUND_EXIT_CODE = 1;

export class SecretToolError extends Error {
  constructor(
    message: string,
    /** Process exit status, or null when the process never ran. */
    public readonly exitCode: number | null,
    public readonly missingBinary: boolean,
  ) {
    super(message);
    this.name = 'SecretToolError';
  }
}

function getSecretToolBin(): string {
  return process.env.KEYRING_ASKPASS_SECRET_TOOL?.trim() || DEFAULT_BIN;
}

/**
 * Run `secret-tool <args>`, optionally feeding stdinData.
 */
export function runSecretTool(args: string[], stdinData?: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = execFile(
      getSecretToolBin(),
      args,
      { timeout: TIMEOUT_MS },
      (error, stdout, stderr) => {
        if (error) {
          const code: unknown = error.code;
          const msg = stderr?.trim() || error.message;
          reject(new SecretToolError(
            `secret-tool ${args[0]} failed: ${msg}`,
            typeof code === 'number' ? code : null,
            code === 'ENOENT',
          ));
          return;
        }
        resolve(stdout);
      },
    );

    if (stdinData !== undefined) {
      child.stdin?.write(stdinData);
    }
    child.stdin?.end();
  });
}

function attributes(folder: string, key?: string): string[] {
  const attrs = ['application', APP_NAME, 'folder', folder];
  if (key !== undefined) attrs.push('key', key);
  return attrs;
}

function isNotFound(error: unknown): boolean {
  return error instanceof SecretToolError && error.exitCode === NOT_FOUND_EXIT_CODE;
}

/**
 * Check that secret-tool can be run at all. Only a missing binary counts
 * as unavailable: an empty search exits non-zero on some versions.
 */
export async function secretToolAvailable(): Promise<boolean> {
  try {
    await runSecretTool(['search', 'application', APP_NAME]);
    return true;
  } catch (error) {
    if (error instanceof SecretToolError && !error.missingBinary) {
      return true;
    }
    return false;
  }
}

export class SecretToolStore extends BaseCredentialStore {
  readonly name = 'secret-tool' as const;

  async hasFolder(folder: string): Promise<boolean> {
    this.ensureOpen();
    try {
      const output = await runSecretTool(['search', '--all', ...attributes(folder)]);
      return output.trim().length > 0;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw this.wrap(error, ErrorCode.STORE_READ_FAILED);
    }
  }

  async createFolder(): Promise<void> {
    this.ensureOpen();
  }

  async read(key: string): Promise<string | null> {
    const folder = this.currentFolder();
    try {
      const secret = await runSecretTool(['lookup', ...attributes(folder, key)]);
      return secret.length > 0 ? secret : null;
    } catch (error) {
      if (isNotFound(error)) return null;
      throw this.wrap(error, ErrorCode.STORE_READ_FAILED);
    }
  }

  async write(key: string, value: string): Promise<void> {
    const folder = this.currentFolder();
    try {
      await runSecretTool(
        ['store', `--label=${APP_NAME}: ${key}`, ...attributes(folder, key)],
        value,
      );
    } catch (error) {
      throw this.wrap(error, ErrorCode.STORE_WRITE_FAILED);
    }
  }

  async rename(oldKey: string, newKey: string): Promise<void> {
    const value = await this.read(oldKey);
    if (value === null) {
      throw new AppError('No entry to rename', ErrorCode.ENTRY_NOT_FOUND, { identifier: oldKey });
    }
    // Store first, so a failure part-way leaves the old entry in place
    await this.write(newKey, value);
    await this.clear(oldKey);
  }

  async remove(key: string): Promise<boolean> {
    // clear exits 0 whether or not anything matched
    if ((await this.read(key)) === null) return false;
    await this.clear(key);
    return true;
  }

  private async clear(key: string): Promise<void> {
    const folder = this.currentFolder();
    try {
      await runSecretTool(['clear', ...attributes(folder, key)]);
    } catch (error) {
      throw this.wrap(error, ErrorCode.STORE_WRITE_FAILED);
    }
  }

  private wrap(error: unknown, code: ErrorCode): AppError {
    const message = error instanceof Error ? error.message : String(error);
    return new AppError(message, code, { store: this.name }, true);
  }
}
