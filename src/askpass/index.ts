export { RequestKind } from './types';
export type { Classification, PromptPattern } from './types';

export { PROMPT_PATTERNS } from './patterns';
export { classifyPrompt, DEFAULT_CLASSIFICATION } from './classifier';
export { legacyKeyVariants, resolveCredential, storeCredential } from './resolver';
export { TerminalDialog } from './dialog';
export type { DialogRequest, DialogResult, PromptDialog, Terminal, TerminalDialogOptions } from './dialog';
export { runAskpass } from './run';
export type { AskpassOptions } from './run';
