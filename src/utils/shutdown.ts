import { describeError } from '../errors/handler';
import { logger } from './logger';

let isShuttingDown = false;
const cleanupHandlers: Array<() => Promise<void> | void> = [];

/**
 * Register cleanup handler
 */
export function onShutdown(handler: () => Promise<void> | void): void {
  cleanupHandlers.push(handler);
}

/**
 * Perform cleanup
 */
export async function cleanup(): Promise<void> {
  if (isShuttingDown) {
    return;
  }

  isShuttingDown = true;
  logger.debug('Cleaning up...');

  for (const handler of cleanupHandlers) {
    try {
      await handler();
    } catch (error) {
      logger.debug(`Cleanup error: ${describeError(error)}`);
    }
  }
}

export interface ShutdownOptions {
  /** Exit status after Ctrl+C. Defaults to the conventional 130. */
  interruptExitCode?: number;
}

/**
 * Setup graceful shutdown handlers
 */
export function setupShutdownHandlers(options: ShutdownOptions = {}): void {
  const interruptExitCode = options.interruptExitCode ?? 130;

  // Ctrl+C, also raised by inquirer when a question is aborted
  process.on('SIGINT', () => {
    logger.debug('Received interrupt signal');
    void cleanup().finally(() => process.exit(interruptExitCode));
  });

  process.on('SIGTERM', () => {
    logger.debug('Received termination signal');
    void cleanup().finally(() => process.exit(143));
  });
}

/**
 * Clear all shutdown handlers and reset state (useful for testing)
 */
export function clearShutdownHandlers(): void {
  cleanupHandlers.length = 0;
  isShuttingDown = false;
}
