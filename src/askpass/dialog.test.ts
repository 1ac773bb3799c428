import { TerminalDialog } from './dialog';
import { RequestKind } from './types';

const mockPrompt = jest.fn();

jest.mock('inquirer', () => ({
  createPromptModule: jest.fn(() => mockPrompt),
}));

import inquirer from 'inquirer';

function setTTY(value: boolean | undefined) {
  Object.defineProperty(process.stdin, 'isTTY', { value, configurable: true });
}

describe('TerminalDialog', () => {
  beforeEach(() => {
    setTTY(true);
  });

  afterEach(() => {
    mockPrompt.mockReset();
    setTTY(undefined);
  });

  it('renders questions on stderr', () => {
    new TerminalDialog();
    expect(inquirer.createPromptModule).toHaveBeenCalledWith({
      input: process.stdin,
      output: process.stderr,
    });
  });

  it('asks for a hidden secret with a masked question', async () => {
    mockPrompt.mockResolvedValue({ value: 'hunter2' });

    const result = await new TerminalDialog().ask({
      kind: RequestKind.SecretHidden,
      text: "git@example.com's password: ",
      canRemember: false,
    });

    expect(result).toEqual({ status: 'accepted', value: 'hunter2', remember: false });
    expect(mockPrompt).toHaveBeenCalledTimes(1);
    expect(mockPrompt).toHaveBeenCalledWith([
      { type: 'password', name: 'value', message: "git@example.com's password:", mask: '*' },
    ]);
  });

  it('asks for a visible value with an input question', async () => {
    mockPrompt.mockResolvedValue({ value: 'alice' });

    const result = await new TerminalDialog().ask({
      kind: RequestKind.SecretVisible,
      text: "Username for 'https://github.com': ",
      canRemember: false,
    });

    expect(result).toEqual({ status: 'accepted', value: 'alice', remember: false });
    expect(mockPrompt).toHaveBeenCalledWith([
      { type: 'input', name: 'value', message: "Username for 'https://github.com':" },
    ]);
  });

  it('accepts an empty answer', async () => {
    mockPrompt.mockResolvedValue({ value: '' });

    const result = await new TerminalDialog().ask({ kind: RequestKind.SecretHidden, text: 'Password: ', canRemember: false });

    expect(result).toEqual({ status: 'accepted', value: '', remember: false });
  });

  it('offers to remember when the store can take the answer', async () => {
    mockPrompt
      .mockResolvedValueOnce({ value: 'hunter2' })
      .mockResolvedValueOnce({ remember: true });

    const result = await new TerminalDialog().ask({
      kind: RequestKind.SecretHidden,
      text: "git@example.com's password: ",
      canRemember: true,
    });

    expect(result).toEqual({ status: 'accepted', value: 'hunter2', remember: true });
    expect(mockPrompt).toHaveBeenLastCalledWith([
      { type: 'confirm', name: 'remember', message: 'Remember in keyring?', default: false },
    ]);
  });

  it('answers yes to an accepted confirmation', async () => {
    mockPrompt.mockResolvedValue({ confirmed: true });

    const result = await new TerminalDialog().ask({
      kind: RequestKind.Confirmation,
      text: 'Allow forward to localhost:5432? ',
      canRemember: false,
    });

    expect(result).toEqual({ status: 'accepted', value: 'yes\n', remember: false });
    expect(mockPrompt).toHaveBeenCalledWith([
      { type: 'confirm', name: 'confirmed', message: 'Allow forward to localhost:5432?', default: false },
    ]);
  });

  it('reports a declined confirmation as cancelled', async () => {
    mockPrompt.mockResolvedValue({ confirmed: false });

    const result = await new TerminalDialog().ask({
      kind: RequestKind.Confirmation,
      text: 'Allow forward to localhost:5432? ',
      canRemember: true,
    });

    expect(result).toEqual({ status: 'cancelled' });
    expect(mockPrompt).toHaveBeenCalledTimes(1);
  });

  it('refuses to prompt without a TTY', async () => {
    setTTY(false);
    const openTerminal = jest.fn(() => null);

    await expect(
      new TerminalDialog({ openTerminal }).ask({ kind: RequestKind.SecretHidden, text: 'Password: ', canRemember: false }),
    ).rejects.toThrow('Interactive prompts require a TTY');
    expect(openTerminal).toHaveBeenCalledTimes(1);
    expect(mockPrompt).not.toHaveBeenCalled();
  });

  it('falls back to the controlling terminal when stdin is redirected', async () => {
    setTTY(false);
    const terminal = {
      input: { isTTY: true, destroy: jest.fn() } as unknown as NodeJS.ReadStream,
      output: { isTTY: true, destroy: jest.fn() } as unknown as NodeJS.WriteStream,
    };
    mockPrompt.mockResolvedValue({ confirmed: true });

    const result = await new TerminalDialog({ openTerminal: () => terminal }).ask({
      kind: RequestKind.Confirmation,
      text: 'Allow use of key /home/alice/.ssh/id_ed25519?\nKey fingerprint SHA256:abcdef.',
      canRemember: false,
    });

    expect(result).toEqual({ status: 'accepted', value: 'yes\n', remember: false });
    expect(inquirer.createPromptModule).toHaveBeenLastCalledWith({ input: terminal.input, output: terminal.output });
    expect(terminal.input.destroy).toHaveBeenCalledTimes(1);
    expect(terminal.output.destroy).toHaveBeenCalledTimes(1);
  });

  it('keeps stdin when it is a terminal', () => {
    const openTerminal = jest.fn(() => null);
    new TerminalDialog({ openTerminal });
    expect(openTerminal).not.toHaveBeenCalled();
  });
});
