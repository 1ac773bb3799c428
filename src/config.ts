import { DEFAULT_FOLDER, DEFAULT_WALLET_FILE } from './constants';
import { normalizeStoreName, type StoreBackend } from './credentials/factory';
import { AppError, ErrorCode } from './errors/types';
import { LogLevel } from './utils/logger';

export interface AskpassConfig {
  store: StoreBackend;
  walletFile: string;
  folder: string;
  logLevel: LogLevel;
}

/** Global options as commander parses them. */
export type GlobalOptions = {
  store?: string;
  walletFile?: string;
  folder?: string;
  debug?: boolean;
  quiet?: boolean;
};

function firstSet(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== '');
}

/**
 * Build the effective configuration. Command-line options take precedence
 * over environment variables, which take precedence over defaults.
 */
export function loadConfig(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): AskpassConfig {
  const store = normalizeStoreName(firstSet(options.store, env.KEYRING_ASKPASS_STORE) ?? 'file');
  const walletFile = firstSet(options.walletFile, env.KEYRING_ASKPASS_WALLET) ?? DEFAULT_WALLET_FILE;

  const folder = options.folder ?? env.KEYRING_ASKPASS_FOLDER ?? DEFAULT_FOLDER;
  if (folder.trim() === '') {
    throw new AppError('Folder name must not be empty', ErrorCode.VALIDATION_ERROR, { folder });
  }

  let logLevel = LogLevel.WARN;
  if (options.debug || env.DEBUG) {
    logLevel = LogLevel.DEBUG;
  }
  // Quiet takes precedence
  if (options.quiet) {
    logLevel = LogLevel.SILENT;
  }

  return { store, walletFile, folder, logLevel };
}
