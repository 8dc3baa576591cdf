/**
 * Pipeline run and verification stage types
 */

import type { PromotionResult } from './promotion.js';

// Verification stages
export const VERIFICATION_STAGES = {
  COMPILE: 'compile',
  FORMAT: 'format',
  LINT: 'lint',
  TEST: 'test',
} as const;

export type VerificationStage = (typeof VERIFICATION_STAGES)[keyof typeof VERIFICATION_STAGES];

export const ALL_VERIFICATION_STAGES: readonly VerificationStage[] = [
  VERIFICATION_STAGES.COMPILE,
  VERIFICATION_STAGES.FORMAT,
  VERIFICATION_STAGES.LINT,
  VERIFICATION_STAGES.TEST,
];

/**
 * Events that start a pipeline run
 */
export type TriggerKind = 'pull_request' | 'push' | 'manual';

export const TRIGGER_KINDS: readonly TriggerKind[] = ['pull_request', 'push', 'manual'];

/**
 * The revision every stage of a run works against
 */
export interface Revision {
  /** Branch or tag name the remote checkout uses */
  refName: string;
  /** Commit hash, when known */
  sha?: string;
}

export type StageStatus = 'passed' | 'failed' | 'cancelled';

/**
 * Outcome of one verification stage
 */
export interface StageResult {
  stage: VerificationStage;
  status: StageStatus;
  command: string;
  exitCode: number | null;
  /** Last lines of combined stdout/stderr */
  output: string;
  error?: string;
  durationMs: number;
}

export type GateReason = 'approved' | 'verification_failed' | 'trigger_not_eligible' | 'promotion_disabled';

/**
 * Whether a run may proceed to promotion
 */
export interface PromotionGate {
  promote: boolean;
  reason: GateReason;
  failedStages: VerificationStage[];
}

export type PipelineRunStatus = 'running' | 'succeeded' | 'failed';

export interface PipelineRun {
  id: string;
  trigger: TriggerKind;
  revision: Revision;
  status: PipelineRunStatus;
  stages: StageResult[];
  gate?: PromotionGate;
  promotion?: PromotionResult;
  startedAt: Date;
  finishedAt?: Date;
}
