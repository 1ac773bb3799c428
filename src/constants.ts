import * as path from 'path';
import { homedir } from 'os';

export const APP_NAME = 'keyring-askpass';

/** Wallet folder used when none is configured. One folder per calling application. */
export const DEFAULT_FOLDER = APP_NAME;

export const DEFAULT_WALLET_DIR = path.join(homedir(), '.keyring-askpass');
export const DEFAULT_WALLET_FILE = path.join(DEFAULT_WALLET_DIR, 'wallet.json');

/** Display text when the caller passes no prompt. */
export const DEFAULT_PROMPT_TEXT = 'Please enter passphrase';

/** Value answered for an accepted yes/no confirmation. */
export const CONFIRMATION_ANSWER = 'yes\n';

export const EXIT_OK = 0;
export const EXIT_CANCELLED = 1;
