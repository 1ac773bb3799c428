import { RequestKind, type PromptPattern } from './types';

function rule(
  source: string,
  pattern: RegExp,
  identifierGroup: number | null,
  kind: RequestKind,
  allowStoreLookup: boolean,
): PromptPattern {
  return Object.freeze({ source, pattern, identifierGroup, kind, allowStoreLookup });
}

const { SecretHidden, SecretVisible, Confirmation } = RequestKind;

/**
 * Known prompts, most specific first. The first pattern that matches wins.
 *
 * openssh and git do not translate these strings, so matching the English
 * text works under every locale. New formats go in as new rows.
 *
 * Patterns work line by line: `[^\n]` stands for any character on the
 * line (carriage returns included) and `\n?$` lets one trailing newline
 * end the prompt.
 */
export const PROMPT_PATTERNS: readonly PromptPattern[] = Object.freeze([
  // password for authentication on a remote server
  rule('openssh sshconnect2.c', /^([^\n]*@[^\n]*)'s password( \(JPAKE\))?: \n?$/, 1, SecretHidden, true),
  // password change: the stored password is the one being replaced
  rule('openssh sshconnect2.c', /^(Enter|Retype) ([^\n]*@[^\n]*)'s (old|new) password: \n?$/, 2, SecretHidden, false),
  rule('openssh sshconnect2.c', /^Enter passphrase for( RSA)? key '([^\n]*)': \n?$/, 2, SecretHidden, true),
  // first attempt for a key file
  rule('openssh ssh-add.c', /^Enter passphrase for ([^\n]*?)( \(will confirm each use\))?: \n?$/, 1, SecretHidden, true),
  // second attempt: the stored passphrase was probably the one that failed
  rule('openssh ssh-add.c', /^Bad passphrase, try again for ([^\n]*?)( \(will confirm each use\))?: \n?$/, 1, SecretHidden, false),
  rule('openssh ssh-pkcs11.c', /^Enter PIN for '([^\n]*)': \n?$/, 1, SecretHidden, true),

  rule('openssh mux.c', /^(Allow|Terminate) shared connection to ([^\n]*)\? \n?$/, 2, Confirmation, false),
  rule('openssh mux.c', /^Open ([^\n]* on [^\n]*)?\n?$/, 1, Confirmation, false),
  rule('openssh mux.c', /^Allow forward to ([^\n]*:[^\n]*)\? \n?$/, 1, Confirmation, false),
  rule('openssh mux.c', /^Disable further multiplexing on shared connection to ([^\n]*)\? \n?$/, 1, Confirmation, false),
  rule('openssh ssh-agent.c', /^Allow use of key ([^\n]*)?\nKey fingerprint [^\n]*\.\n?$/, 1, Confirmation, false),
  rule('openssh sshconnect.c', /^Add key ([^\n]*) \([^\n]*\) to agent\?\n?$/, 1, Confirmation, false),

  rule('git imap-send.c', /^Password \(([^\n]*@[^\n]*)\): \n?$/, 1, SecretHidden, true),
  // git asking without naming anything: nothing to key a stored secret by
  rule('git credential.c', /^Username: \n?$/, null, SecretVisible, false),
  rule('git credential.c', /^Password: \n?$/, null, SecretHidden, false),
  rule('git credential.c', /^Username for '([^\n]*)': \n?$/, 1, SecretVisible, true),
  rule('git credential.c', /^Password for '([^\n]*)': \n?$/, 1, SecretHidden, true),
  rule('git-lfs', /^Username for "([^\n]*?)"\n?$/, 1, SecretVisible, true),
  rule('git-lfs', /^Password for "([^\n]*?)"\n?$/, 1, SecretHidden, true),

  // mercurial and other ssh-alikes without a user@host form
  rule('mercurial', /^([^\n]*?)'s password: \n?$/, 1, SecretHidden, true),
]);
