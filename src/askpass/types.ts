/**
 * Prompt classification types.
 *
 * A prompt is reduced to three independent facts: what kind of answer is
 * wanted, which credential it names, and whether a stored secret may be
 * offered for it.
 */

export enum RequestKind {
  /** Password or passphrase, typed without echo. */
  SecretHidden = 'secret-hidden',
  /** Typed with echo, e.g. a username. */
  SecretVisible = 'secret-visible',
  /** Yes/no decision. */
  Confirmation = 'confirmation',
}

export interface Classification {
  readonly kind: RequestKind;
  /** Host, key path, token label or URL the credential is keyed by. */
  readonly identifier: string | null;
  /** False where reusing a stored secret is known to be wrong (retries, password changes, confirmations). */
  readonly allowStoreLookup: boolean;
}

export interface PromptPattern {
  /** Anchored at both ends: a pattern accounts for the whole prompt. */
  readonly pattern: RegExp;
  readonly identifierGroup: number | null;
  readonly kind: RequestKind;
  readonly allowStoreLookup: boolean;
  /** Upstream tool and source file that emits the prompt. */
  readonly source: string;
}
