import chalk from 'chalk';
import { AppError, ErrorCode } from './types';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && typeof Reflect.get(error, 'code') === 'string';
}

/**
 * Map Node.js system errors to app errors
 */
export function mapSystemError(error: NodeJS.ErrnoException): AppError {
  switch (error.code) {
    case 'ENOENT':
      return new AppError(
        'File or directory not found',
        ErrorCode.FILE_NOT_FOUND,
        { path: error.path, syscall: error.syscall },
        false
      );

    case 'EACCES':
    case 'EPERM':
      return new AppError(
        'Permission denied',
        ErrorCode.PERMISSION_DENIED,
        { path: error.path, syscall: error.syscall },
        false
      );

    default:
      return new AppError(
        error.message || 'System error',
        ErrorCode.UNKNOWN_ERROR,
        { originalCode: error.code, syscall: error.syscall },
        false
      );
  }
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (isErrnoException(error)) {
    return mapSystemError(error);
  }

  if (error instanceof Error) {
    return new AppError(
      error.message,
      ErrorCode.UNKNOWN_ERROR,
      { originalError: error.name },
      false
    );
  }

  return new AppError(
    String(error),
    ErrorCode.UNKNOWN_ERROR,
    {},
    false
  );
}

/**
 * Short form for log lines: never includes details, which may name a secret's identifier.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Handle and format error for CLI display
 */
export function handleError(error: unknown, debug: boolean = false): void {
  const appError = toAppError(error);

  console.error(chalk.red.bold('\n✗ Error:'), appError.toUserMessage());

  const suggestion = appError.getRecoverySuggestion();
  if (suggestion) {
    console.error(chalk.yellow('\n💡 Suggestion:'), suggestion);
  }

  if (appError.isRecoverable && !suggestion) {
    console.error(chalk.yellow('\n💡 This error may be temporary. Please try again.'));
  }

  if (debug) {
    console.error(chalk.dim('\n📋 Debug Information:'));
    console.error(chalk.dim('  Error Code:'), appError.code);
    console.error(chalk.dim('  Technical Message:'), appError.message);
    console.error(chalk.dim('  Recoverable:'), appError.isRecoverable);

    if (appError.details && Object.keys(appError.details).length > 0) {
      console.error(chalk.dim('  Details:'));
      console.error(chalk.dim(JSON.stringify(appError.details, null, 4)));
    }

    if (appError.stack) {
      console.error(chalk.dim('\n📚 Stack Trace:'));
      console.error(chalk.dim(appError.stack));
    }
  } else {
    console.error(chalk.dim('\n💻 Run with --debug for detailed error information'));
  }
}
