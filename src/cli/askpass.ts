import { Command } from 'commander';

import { runAskpass, TerminalDialog } from '../askpass';
import { APP_NAME, EXIT_CANCELLED } from '../constants';
import { loadConfig, type GlobalOptions } from '../config';
import { handleError } from '../errors/handler';
import { logger, LogLevel } from '../utils/logger';
import { openConfiguredStore } from './store';
import { createCredentialCommand } from './credential';
import { version as pkgVersion } from '../../package.json';

/**
 * Build the command-line program: `keyring-askpass [prompt]` answers one
 * prompt; `keyring-askpass credential ...` manages stored secrets.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description('Answer ssh and git password prompts, remembering secrets in a keyring.')
    .version(pkgVersion, '-v, --version', 'Display version')
    .argument('[prompt]', 'Prompt text passed by ssh, ssh-agent or git')
    .option('--store <backend>', 'Credential store: file (default), secret-tool, none')
    .option('--wallet-file <path>', 'Wallet file used by the file store')
    .option('--folder <name>', 'Store folder holding the entries')
    .option('-d, --debug', 'Enable debug output')
    .option('-q, --quiet', 'Suppress all non-error output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<GlobalOptions>();
      logger.setLevel(loadConfig(opts).logLevel);

      if (opts.quiet) {
        process.env.QUIET = 'true';
      }
    })
    .action(async (prompt: string | undefined, options: GlobalOptions) => {
      try {
        const config = loadConfig(options);
        process.exitCode = await runAskpass({
          prompt,
          folder: config.folder,
          openStore: () => openConfiguredStore(config),
          dialog: new TerminalDialog(),
        });
      } catch (error) {
        handleError(error, logger.getLevel() === LogLevel.DEBUG);
        process.exitCode = EXIT_CANCELLED;
      }
    });

  program.addCommand(createCredentialCommand());

  return program;
}
