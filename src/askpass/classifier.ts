import { logger } from '../utils/logger';
import { PROMPT_PATTERNS } from './patterns';
import { RequestKind, type Classification, type PromptPattern } from './types';

/**
 * Classification for a missing or unrecognized prompt: ask for a hidden
 * secret and never touch the credential store.
 */
export const DEFAULT_CLASSIFICATION: Classification = Object.freeze({
  kind: RequestKind.SecretHidden,
  identifier: null,
  allowStoreLookup: false,
});

function applyPattern(rule: PromptPattern, prompt: string): Classification | null {
  const match = rule.pattern.exec(prompt);
  if (!match) return null;

  // An optional group that took no part in the match leaves the credential unnamed
  const captured = rule.identifierGroup === null ? undefined : match[rule.identifierGroup];

  return {
    kind: rule.kind,
    identifier: captured ?? null,
    allowStoreLookup: rule.allowStoreLookup,
  };
}

/**
 * Work out what a prompt asks for. Never fails: prompts that match no
 * known format fall back to DEFAULT_CLASSIFICATION with a warning.
 */
export function classifyPrompt(
  prompt: string,
  patterns: readonly PromptPattern[] = PROMPT_PATTERNS,
): Classification {
  for (const rule of patterns) {
    const classification = applyPattern(rule, prompt);
    if (classification) {
      logger.debug(`Prompt matched ${rule.source} pattern ${rule.pattern.source}`);
      return classification;
    }
  }

  logger.warn('Unable to parse prompt', JSON.stringify(prompt));
  return DEFAULT_CLASSIFICATION;
}
