/**
 * Pipeline Orchestrator
 * One pipeline run: verification stages in parallel, the gate, then (maybe) promotion.
 *
 *   trigger ──▶ compile ┐
 *               format  ├──▶ gate ──▶ promotion (credentials → sync → rebuild → restart → cleanup)
 *               lint    │
 *               test    ┘
 *
 * Promotion is constructed lazily, so nothing touches SSH settings or secrets
 * unless the gate approves.
 */

import { EventEmitter } from 'eventemitter3';
import { randomUUID } from 'node:crypto';
import {
  ALL_VERIFICATION_STAGES,
  PromotionGateError,
  createChildLogger,
  type Logger,
  type PipelineRun,
  type PromotionGate,
  type PromotionTransition,
  type Revision,
  type StageResult,
  type TriggerKind,
  type VerificationStage,
} from '@deckhand/shared';
import type { VerificationRunner, StageDefinition } from '../verification/index.js';
import type { PromotionStage } from '../promotion/index.js';
import { decideGate } from './gate.js';

// ===========================================
// Types
// ===========================================

export interface PipelineOrchestratorConfig {
  /** Triggers allowed to promote */
  promoteOn: readonly TriggerKind[];
  requiredStages: readonly VerificationStage[];
}

export const DEFAULT_PIPELINE_ORCHESTRATOR_CONFIG: PipelineOrchestratorConfig = {
  promoteOn: ['manual'],
  requiredStages: ALL_VERIFICATION_STAGES,
};

export interface PipelineOrchestratorDependencies {
  verification: VerificationRunner;
  /** Builds the promotion stage once the gate approves; without it runs are check-only */
  promotionFactory?: () => PromotionStage;
  logger?: Logger;
}

export interface PipelineRunOptions {
  trigger: TriggerKind;
  revision: Revision;
  /** Set false to run the checks only */
  promote?: boolean;
  runId?: string;
}

export interface PipelineOrchestratorEvents {
  'run:started': (run: PipelineRun) => void;
  'stage:started': (event: { runId: string; stage: VerificationStage; command: string }) => void;
  'stage:completed': (event: { runId: string; result: StageResult }) => void;
  'gate:decided': (event: { runId: string; gate: PromotionGate }) => void;
  'promotion:state': (event: { runId: string; transition: PromotionTransition }) => void;
  'run:completed': (run: PipelineRun) => void;
}

// ===========================================
// Orchestrator
// ===========================================

export class PipelineOrchestrator extends EventEmitter<PipelineOrchestratorEvents> {
  private readonly config: PipelineOrchestratorConfig;
  private readonly verification: VerificationRunner;
  private readonly promotionFactory: (() => PromotionStage) | undefined;
  private readonly logger: Logger;

  constructor(
    deps: PipelineOrchestratorDependencies,
    config: Partial<PipelineOrchestratorConfig> = {}
  ) {
    super();
    this.config = { ...DEFAULT_PIPELINE_ORCHESTRATOR_CONFIG, ...config };
    this.verification = deps.verification;
    this.promotionFactory = deps.promotionFactory;
    this.logger = deps.logger ?? createChildLogger({ component: 'PipelineOrchestrator' });
  }

  /**
   * Execute one pipeline run
   */
  async run(options: PipelineRunOptions): Promise<PipelineRun> {
    const run: PipelineRun = {
      id: options.runId ?? randomUUID(),
      trigger: options.trigger,
      revision: options.revision,
      status: 'running',
      stages: [],
      startedAt: new Date(),
    };

    this.logger.info({
      runId: run.id,
      trigger: run.trigger,
      refName: run.revision.refName,
      sha: run.revision.sha,
    }, 'Pipeline run started');
    this.emit('run:started', run);

    // ─── Verification ───
    const onStageStarted = (definition: StageDefinition): void => {
      this.emit('stage:started', { runId: run.id, stage: definition.stage, command: definition.command });
    };
    const onStageCompleted = (result: StageResult): void => {
      this.emit('stage:completed', { runId: run.id, result });
    };

    this.verification.on('stage:started', onStageStarted);
    this.verification.on('stage:completed', onStageCompleted);
    try {
      const summary = await this.verification.runAll(run.id);
      run.stages = summary.results;
    } finally {
      this.verification.off('stage:started', onStageStarted);
      this.verification.off('stage:completed', onStageCompleted);
    }

    // ─── Gate ───
    const gate = decideGate({
      results: run.stages,
      trigger: run.trigger,
      promoteOn: this.config.promoteOn,
      promoteEnabled: options.promote !== false && this.promotionFactory !== undefined,
      requiredStages: this.config.requiredStages,
    });
    run.gate = gate;

    this.logger.info({ runId: run.id, ...gate }, 'Promotion gate decided');
    this.emit('gate:decided', { runId: run.id, gate });

    // ─── Promotion ───
    if (gate.promote && this.promotionFactory) {
      const onTransition = (transition: PromotionTransition): void => {
        this.emit('promotion:state', { runId: run.id, transition });
      };
      let promotion: PromotionStage | undefined;

      try {
        promotion = this.promotionFactory();
        promotion.on('state:changed', onTransition);
        run.promotion = await promotion.run(run.revision.refName, run.id);
      } catch (error) {
        // Missing remote settings or a lock held elsewhere: the remote was never touched
        this.complete(run, 'failed');
        throw error;
      } finally {
        promotion?.off('state:changed', onTransition);
      }
    }

    const verificationFailed = gate.reason === 'verification_failed';
    const promotionFailed = run.promotion !== undefined && !run.promotion.success;
    return this.complete(run, verificationFailed || promotionFailed ? 'failed' : 'succeeded');
  }

  /**
   * Manual dispatch that must end in a promotion. Throws PromotionGateError when the gate refuses.
   */
  async promote(revision: Revision): Promise<PipelineRun> {
    const run = await this.run({ trigger: 'manual', revision });

    if (!run.gate?.promote) {
      throw new PromotionGateError(
        `Promotion refused: ${run.gate?.reason ?? 'no gate decision'}`,
        {
          runId: run.id,
          reason: run.gate?.reason,
          failedStages: run.gate?.failedStages ?? [],
        }
      );
    }

    return run;
  }

  private complete(run: PipelineRun, status: 'succeeded' | 'failed'): PipelineRun {
    run.status = status;
    run.finishedAt = new Date();

    this.logger.info({
      runId: run.id,
      status,
      durationMs: run.finishedAt.getTime() - run.startedAt.getTime(),
      promoted: run.promotion?.success ?? false,
    }, 'Pipeline run completed');
    this.emit('run:completed', run);

    return run;
  }
}
