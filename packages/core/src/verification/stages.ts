/**
 * Stage definitions built from configuration
 */

import { VERIFICATION_STAGES } from '@deckhand/shared';
import type { StageDefinition, VerificationCommands } from './types.js';

export const DEFAULT_VERIFICATION_COMMANDS: VerificationCommands = {
  compileCommand: 'cargo check',
  formatCommand: 'cargo +nightly fmt --all -- --check',
  lintCommand: 'cargo clippy --all-features',
  testCommand: 'cargo test --workspace',
  denyWarnings: true,
  stageTimeoutMs: 1800000, // 30 minutes
};

/**
 * Add the deny-warnings flag to a lint command, keeping any `--` arguments it already has
 */
export function withDeniedWarnings(lintCommand: string): string {
  if (/(^|\s)-D\s+warnings(\s|$)/.test(lintCommand)) return lintCommand;
  return /(^|\s)--(\s|$)/.test(lintCommand)
    ? `${lintCommand} -D warnings`
    : `${lintCommand} -- -D warnings`;
}

/**
 * The four stages every run must pass
 */
export function buildStageDefinitions(
  commands: Partial<VerificationCommands> = {}
): StageDefinition[] {
  const resolved = { ...DEFAULT_VERIFICATION_COMMANDS, ...commands };
  const timeoutMs = resolved.stageTimeoutMs;

  return [
    { stage: VERIFICATION_STAGES.COMPILE, command: resolved.compileCommand, timeoutMs },
    { stage: VERIFICATION_STAGES.FORMAT, command: resolved.formatCommand, timeoutMs },
    {
      stage: VERIFICATION_STAGES.LINT,
      command: resolved.denyWarnings ? withDeniedWarnings(resolved.lintCommand) : resolved.lintCommand,
      timeoutMs,
    },
    { stage: VERIFICATION_STAGES.TEST, command: resolved.testCommand, timeoutMs },
  ];
}
