/**
 * Terminal prompt dialog.
 *
 * Asks the user for the answer the classifier decided on, via inquirer.
 * Questions render on stderr because stdout is read back by the caller.
 * ssh-agent and ssh without a terminal on stdin start askpass with stdin
 * redirected; the dialog then talks to the controlling terminal instead.
 */

import * as fs from 'fs-extra';
import inquirer from 'inquirer';
import * as tty from 'tty';

import { CONFIRMATION_ANSWER } from '../constants';
import { AppError, ErrorCode } from '../errors/types';
import { describeError } from '../errors/handler';
import { logger } from '../utils/logger';
import { RequestKind } from './types';

const CONTROLLING_TERMINAL = '/dev/tty';

export interface DialogRequest {
  kind: RequestKind;
  /** The prompt as received, or the default text. */
  text: string;
  /** Offer to remember the answer. */
  canRemember: boolean;
}

export type DialogResult =
  | { status: 'cancelled' }
  | { status: 'accepted'; value: string; remember: boolean };

export interface PromptDialog {
  ask(request: DialogRequest): Promise<DialogResult>;
}

export interface Terminal {
  input: NodeJS.ReadStream;
  output: NodeJS.WriteStream;
}

/**
 * Open the controlling terminal of the process, or null when it has none.
 */
export function openControllingTerminal(): Terminal | null {
  let inputFd: number | null = null;
  try {
    inputFd = fs.openSync(CONTROLLING_TERMINAL, 'r');
    const outputFd = fs.openSync(CONTROLLING_TERMINAL, 'w');
    return { input: new tty.ReadStream(inputFd), output: new tty.WriteStream(outputFd) };
  } catch (error) {
    if (inputFd !== null) fs.closeSync(inputFd);
    logger.debug(`No controlling terminal: ${describeError(error)}`);
    return null;
  }
}

export interface TerminalDialogOptions {
  input?: NodeJS.ReadStream;
  output?: NodeJS.WriteStream;
  /** Used when stdin is not a terminal and no input is given. */
  openTerminal?: () => Terminal | null;
}

export class TerminalDialog implements PromptDialog {
  private readonly input: NodeJS.ReadStream;
  private readonly prompt: inquirer.PromptModule;
  /** Streams opened here, destroyed once the dialog is done. */
  private readonly owned: Terminal | null = null;

  constructor(options: TerminalDialogOptions = {}) {
    let input: NodeJS.ReadStream = options.input ?? process.stdin;
    let output: NodeJS.WriteStream = options.output ?? process.stderr;

    if (!options.input && !process.stdin.isTTY) {
      this.owned = (options.openTerminal ?? openControllingTerminal)();
      if (this.owned) {
        input = this.owned.input;
        output = options.output ?? this.owned.output;
      }
    }

    this.input = input;
    this.prompt = inquirer.createPromptModule({ input, output });
  }

  async ask(request: DialogRequest): Promise<DialogResult> {
    try {
      return await this.askOnTerminal(request);
    } finally {
      this.owned?.input.destroy();
      this.owned?.output.destroy();
    }
  }

  private async askOnTerminal(request: DialogRequest): Promise<DialogResult> {
    if (!this.input.isTTY) {
      throw new AppError('Interactive prompts require a TTY', ErrorCode.PROMPT_UNAVAILABLE);
    }

    const message = request.text.trimEnd();

    if (request.kind === RequestKind.Confirmation) {
      const { confirmed } = await this.prompt<{ confirmed: boolean }>([
        { type: 'confirm', name: 'confirmed', message, default: false },
      ]);
      return confirmed
        ? { status: 'accepted', value: CONFIRMATION_ANSWER, remember: false }
        : { status: 'cancelled' };
    }

    const { value } = await this.prompt<{ value: string }>([
      request.kind === RequestKind.SecretVisible
        ? { type: 'input', name: 'value', message }
        : { type: 'password', name: 'value', message, mask: '*' },
    ]);

    let remember = false;
    if (request.canRemember) {
      const answers = await this.prompt<{ remember: boolean }>([
        { type: 'confirm', name: 'remember', message: 'Remember in keyring?', default: false },
      ]);
      remember = answers.remember;
    }

    return { status: 'accepted', value, remember };
  }
}
