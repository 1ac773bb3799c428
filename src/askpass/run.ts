import { DEFAULT_PROMPT_TEXT, EXIT_CANCELLED, EXIT_OK } from '../constants';
import { describeError } from '../errors/handler';
import type { CredentialStore } from '../credentials/types';
import { logger } from '../utils/logger';
import { classifyPrompt, DEFAULT_CLASSIFICATION } from './classifier';
import type { PromptDialog } from './dialog';
import { resolveCredential, storeCredential } from './resolver';

export interface AskpassOptions {
  /** First positional argument; undefined when the caller passed none. */
  prompt?: string;
  folder: string;
  openStore: () => Promise<CredentialStore | null>;
  dialog: PromptDialog;
  output?: NodeJS.WritableStream;
}

/**
 * Answer one prompt: from the credential store when possible, otherwise
 * from the user. Resolves to the process exit code.
 *
 * A secret found in the store is written without a trailing newline, a
 * typed one with it. Both forms are in use by existing callers.
 */
export async function runAskpass(options: AskpassOptions): Promise<number> {
  const { prompt, folder, dialog } = options;
  const output = options.output ?? process.stdout;

  const text = prompt ?? DEFAULT_PROMPT_TEXT;
  const classification = prompt === undefined ? DEFAULT_CLASSIFICATION : classifyPrompt(prompt);
  logger.debug(
    `Prompt kind: ${classification.kind}, identifier: ${classification.identifier ?? '(none)'}, ` +
    `store lookup: ${classification.allowStoreLookup}`,
  );

  const store = classification.allowStoreLookup ? await options.openStore() : null;

  try {
    const stored = await resolveCredential(classification, store, folder);
    if (stored !== null) {
      logger.debug('Answering from credential store');
      output.write(stored);
      return EXIT_OK;
    }

    const { identifier } = classification;
    const result = await dialog.ask({
      kind: classification.kind,
      text,
      canRemember: store !== null && identifier !== null,
    });

    if (result.status === 'cancelled') {
      logger.debug('Dialog cancelled');
      return EXIT_CANCELLED;
    }

    if (result.remember && store && identifier !== null) {
      try {
        await storeCredential(identifier, result.value, store, folder);
        logger.debug(`Stored secret for ${identifier}`);
      } catch (error) {
        logger.warn(`Failed to store secret for ${identifier}: ${describeError(error)}`);
      }
    }

    output.write(`${result.value}\n`);
    return EXIT_OK;
  } finally {
    await store?.close();
  }
}
