/**
 * Error codes for different error scenarios
 */
export enum ErrorCode {
  // Credential store errors
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  STORE_READ_FAILED = 'STORE_READ_FAILED',
  STORE_WRITE_FAILED = 'STORE_WRITE_FAILED',
  STORE_CLOSED = 'STORE_CLOSED',
  NO_FOLDER_SELECTED = 'NO_FOLDER_SELECTED',
  ENTRY_NOT_FOUND = 'ENTRY_NOT_FOUND',

  // Dialog errors
  PROMPT_UNAVAILABLE = 'PROMPT_UNAVAILABLE',

  // File system errors
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  PERMISSION_DENIED = 'PERMISSION_DENIED',

  // Generic
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
}

/**
 * Custom application error class with error codes and recovery hints
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public details?: Record<string, unknown>,
    public isRecoverable: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  private detail(key: string): string {
    const value = this.details?.[key];
    return value === undefined ? 'unknown' : String(value);
  }

  /**
   * Convert to user-friendly message
   */
  toUserMessage(): string {
    switch (this.code) {
      case ErrorCode.STORE_UNAVAILABLE:
        return `Credential store is not available: ${this.detail('store')}`;

      case ErrorCode.STORE_READ_FAILED:
        return 'Could not read from the credential store.';

      case ErrorCode.STORE_WRITE_FAILED:
        return 'Could not write to the credential store.';

      case ErrorCode.STORE_CLOSED:
        return 'The credential store has already been closed.';

      case ErrorCode.NO_FOLDER_SELECTED:
        return 'No credential store folder is selected.';

      case ErrorCode.ENTRY_NOT_FOUND:
        return `No stored secret for: ${this.detail('identifier')}`;

      case ErrorCode.PROMPT_UNAVAILABLE:
        return 'Cannot ask for input: no interactive terminal is attached.';

      case ErrorCode.FILE_NOT_FOUND:
        return `File not found: ${this.detail('path')}`;

      case ErrorCode.PERMISSION_DENIED:
        return `Permission denied: ${this.detail('path')}`;

      case ErrorCode.VALIDATION_ERROR:
        return this.message || 'Validation error. Please check your input.';

      default:
        return this.message || 'An unknown error occurred.';
    }
  }

  /**
   * Get recovery suggestion for the error
   */
  getRecoverySuggestion(): string | null {
    switch (this.code) {
      case ErrorCode.STORE_UNAVAILABLE:
        return 'Check --store and --wallet-file, or use --store none';

      case ErrorCode.PROMPT_UNAVAILABLE:
        return 'Run from a terminal, or store the secret first with: keyring-askpass credential store';

      case ErrorCode.ENTRY_NOT_FOUND:
        return 'Store it with: keyring-askpass credential store --identifier <id>';

      case ErrorCode.PERMISSION_DENIED:
        return 'Check the permissions of the wallet file and its directory';

      default:
        return null;
    }
  }
}
