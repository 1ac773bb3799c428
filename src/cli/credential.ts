/**
 * `keyring-askpass credential` subcommand.
 *
 * Manages stored secrets by identifier, in the store selected by the
 * global --store option:
 *
 * Subcommands:
 *   store  - Store a secret (from stdin or an interactive prompt)
 *   remove - Remove a stored secret
 *   verify - Check that a secret can be found, migrating legacy keys
 */

import { Command } from 'commander';
import inquirer from 'inquirer';

import { RequestKind, resolveCredential, storeCredential } from '../askpass';
import { loadConfig, type AskpassConfig, type GlobalOptions } from '../config';
import { AppError, ErrorCode } from '../errors/types';
import { handleError } from '../errors/handler';
import { logger, LogLevel } from '../utils/logger';
import { outputResult } from '../utils/output';
import { isStdinPiped, readSecretFromStdin } from '../utils/stdin';
import { requireStore } from './store';

interface IdentifierOptions {
  identifier: string;
}

interface StoreCommandOptions extends IdentifierOptions {
  passwordStdin?: boolean;
}

function configFor(command: Command): AskpassConfig {
  return loadConfig(command.optsWithGlobals<GlobalOptions>());
}

async function promptSecret(identifier: string): Promise<string> {
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    throw new AppError(
      '--password-stdin is required in non-interactive mode',
      ErrorCode.PROMPT_UNAVAILABLE,
    );
  }

  const answers = await inquirer.prompt<{ secret: string }>([
    {
      type: 'password',
      name: 'secret',
      message: `Secret for ${identifier}:`,
      mask: '*',
      validate: (input: string) => input.length > 0 || 'Secret is required',
    },
  ]);
  return answers.secret;
}

/**
 * Run an action, reporting failures the same way for every subcommand.
 */
async function runAction(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    handleError(error, logger.getLevel() === LogLevel.DEBUG);
    process.exitCode = 1;
  }
}

export function createCredentialCommand(): Command {
  const cmd = new Command('credential');
  cmd.description('Manage stored secrets');

  // --- store ---
  cmd
    .command('store')
    .description('Store a secret under an identifier')
    .requiredOption('-i, --identifier <id>', 'Identifier (host, key path, URL) the secret is keyed by')
    .option('--password-stdin', 'Read the secret from stdin')
    .action((options: StoreCommandOptions, command: Command) => runAction(async () => {
      const config = configFor(command);
      const secret = options.passwordStdin || isStdinPiped()
        ? await readSecretFromStdin()
        : await promptSecret(options.identifier);

      const store = await requireStore(config);
      try {
        await storeCredential(options.identifier, secret, store, config.folder);
      } finally {
        await store.close();
      }

      outputResult(`Secret stored for ${options.identifier} in ${store.name} store`);
    }));

  // --- remove ---
  cmd
    .command('remove')
    .description('Remove a stored secret')
    .requiredOption('-i, --identifier <id>', 'Identifier of the secret')
    .action((options: IdentifierOptions, command: Command) => runAction(async () => {
      const config = configFor(command);
      const store = await requireStore(config);

      let removed = false;
      try {
        if (await store.hasFolder(config.folder)) {
          await store.selectFolder(config.folder);
          removed = await store.remove(options.identifier);
        }
      } finally {
        await store.close();
      }

      if (!removed) {
        throw new AppError('Nothing to remove', ErrorCode.ENTRY_NOT_FOUND, { identifier: options.identifier });
      }
      outputResult(`Secret removed for ${options.identifier} from ${store.name} store`);
    }));

  // --- verify ---
  cmd
    .command('verify')
    .description('Check that a stored secret can be found (never prints it)')
    .requiredOption('-i, --identifier <id>', 'Identifier of the secret')
    .action((options: IdentifierOptions, command: Command) => runAction(async () => {
      const config = configFor(command);
      const store = await requireStore(config);

      let secret: string | null;
      try {
        secret = await resolveCredential(
          { kind: RequestKind.SecretHidden, identifier: options.identifier, allowStoreLookup: true },
          store,
          config.folder,
        );
      } finally {
        await store.close();
      }

      if (secret === null) {
        throw new AppError('Secret not found', ErrorCode.ENTRY_NOT_FOUND, { identifier: options.identifier });
      }
      outputResult(`Secret found for ${options.identifier} in ${store.name} store`);
    }));

  return cmd;
}
