/**
 * Verification stage types
 */

import type { CommandExecutor, Logger, StageResult, VerificationStage } from '@deckhand/shared';

/**
 * One check run against the source tree
 */
export interface StageDefinition {
  stage: VerificationStage;
  /** Full command line, run through the shell */
  command: string;
  timeoutMs: number;
}

export interface VerificationCommands {
  compileCommand: string;
  formatCommand: string;
  lintCommand: string;
  testCommand: string;
  /** Append `-- -D warnings` to the lint command */
  denyWarnings: boolean;
  stageTimeoutMs: number;
}

export interface VerificationRunnerConfig {
  /** Source tree every stage runs in */
  sourceDir: string;
  stages: StageDefinition[];
  /** Cancel the remaining stages once one fails */
  failFast: boolean;
  /** Lines of output kept on each result */
  outputTailLines: number;
}

export interface VerificationRunnerDeps {
  executor?: CommandExecutor;
  logger?: Logger;
}

export interface VerificationRunnerEvents {
  'stage:started': (definition: StageDefinition) => void;
  'stage:completed': (result: StageResult) => void;
}

export interface VerificationSummary {
  passed: boolean;
  results: StageResult[];
  failedStages: VerificationStage[];
  durationMs: number;
}
