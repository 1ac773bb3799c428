/**
 * Check if quiet mode is enabled
 */
export function isQuiet(): boolean {
  return process.env.QUIET === 'true';
}

/**
 * Print a status line for the management commands (suppressed in quiet mode).
 * Goes to stdout: these commands are not read back by ssh or git.
 */
export function outputResult(data: string): void {
  if (!isQuiet()) {
    console.log(data);
  }
}
