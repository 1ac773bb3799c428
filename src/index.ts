#!/usr/bin/env node
import { createProgram } from './cli/askpass';
import { EXIT_CANCELLED } from './constants';
import { handleError } from './errors/handler';
import { logger, LogLevel } from './utils/logger';
import { setupShutdownHandlers } from './utils/shutdown';

function isDebug(): boolean {
  return logger.getLevel() === LogLevel.DEBUG;
}

// Ctrl+C at a question is a cancellation, reported like one
setupShutdownHandlers({ interruptExitCode: EXIT_CANCELLED });

process.on('unhandledRejection', (error: unknown) => {
  handleError(error, isDebug());
  process.exit(1);
});

process.on('uncaughtException', (error: unknown) => {
  handleError(error, isDebug());
  process.exit(1);
});

createProgram().parseAsync(process.argv).catch((error: unknown) => {
  handleError(error, isDebug());
  process.exitCode = 1;
});
