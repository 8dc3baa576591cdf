/**
 * Promotion Stage
 * Applies a verified revision to the remote target: checkout, pull, rebuild, restart.
 * Each step is its own remote call so the result names the step that failed and what
 * the remote side was left with. No rollback; credentials are removed on every path.
 */

import { EventEmitter } from 'eventemitter3';
import { randomUUID } from 'node:crypto';
import {
  PROMOTION_STATES,
  RemoteCommandError,
  createChildLogger,
  tailLines,
  type Logger,
  type PromotionResult,
  type RemoteOutcome,
  type RemoteStep,
  type RemoteStepResult,
  type RemoteTarget,
} from '@deckhand/shared';
import {
  CredentialManager,
  SshSession,
  describeTarget,
  renderChainedCommand,
  renderStepCommand,
  withCredentialBundle,
  type StepwiseRemoteStep,
} from '@deckhand/ssh';
import { PromotionStateMachine } from '../state-machine/index.js';
import type { PromotionLock } from '../lock/index.js';
import {
  DEFAULT_PROMOTION_STAGE_CONFIG,
  type PromotionStageConfig,
  type PromotionStageDeps,
  type PromotionStageEvents,
  type RemoteSession,
  type RemoteSessionFactory,
} from './types.js';

type FailedStep = NonNullable<PromotionResult['failedStep']>;

// What the remote side holds once a step has succeeded
const OUTCOME_AFTER: Record<RemoteStep, RemoteOutcome> = {
  checkout: 'checked_out',
  pull: 'synced',
  build: 'rebuilt',
  restart: 'restarted',
  chained: 'restarted',
};

/**
 * Mutable record of one run, filled in as steps complete
 */
interface RunProgress {
  steps: RemoteStepResult[];
  outcome: RemoteOutcome;
  failedStep?: FailedStep;
  error?: string;
}

export class PromotionStage extends EventEmitter<PromotionStageEvents> {
  private readonly target: RemoteTarget;
  private readonly privateKey: string;
  private readonly config: PromotionStageConfig;
  private readonly credentials: CredentialManager;
  private readonly sessionFactory: RemoteSessionFactory;
  private readonly lock: PromotionLock | undefined;
  private readonly logger: Logger;

  constructor(
    target: RemoteTarget,
    privateKey: string,
    config: Partial<PromotionStageConfig> = {},
    deps: PromotionStageDeps = {}
  ) {
    super();
    this.target = target;
    this.privateKey = privateKey;
    this.config = { ...DEFAULT_PROMOTION_STAGE_CONFIG, ...config };
    this.credentials = deps.credentials ?? new CredentialManager();
    this.sessionFactory = deps.sessionFactory ?? ((remote, bundle) => new SshSession(remote, bundle, {
      connectTimeoutSec: this.config.connectTimeoutSec,
      commandTimeoutMs: this.config.commandTimeoutMs,
    }));
    this.lock = deps.lock;
    this.logger = deps.logger ?? createChildLogger({ component: 'PromotionStage' });
  }

  /**
   * Promote `refName`. Resolves with the outcome for every remote failure;
   * rejects only when the lock is held by another promotion.
   */
  async run(refName: string, runId: string = randomUUID()): Promise<PromotionResult> {
    const startTime = Date.now();
    const targetName = describeTarget(this.target);
    const held = this.lock ? await this.lock.acquire(this.target) : undefined;

    const machine = new PromotionStateMachine({ runId, target: targetName });
    machine.on('state:changed', (transition) => this.emit('state:changed', transition));

    const progress: RunProgress = { steps: [], outcome: 'unchanged' };
    let credentialsRemoved = false;

    this.logger.info({
      runId,
      refName,
      target: targetName,
      commandMode: this.config.commandMode,
    }, 'Starting promotion');

    try {
      await withCredentialBundle(
        this.credentials,
        this.target,
        this.privateKey,
        async (bundle) => {
          machine.transition(PROMOTION_STATES.CREDENTIALS_INSTALLED);
          const session = this.sessionFactory(this.target, bundle);
          try {
            await this.applyRemote(session, machine, refName, progress);
          } finally {
            await session.close();
          }
        },
        (removed) => {
          credentialsRemoved = removed;
        }
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const state = machine.getState();
      if (state === PROMOTION_STATES.IDLE) {
        // install removes a partial bundle before it throws
        credentialsRemoved = true;
      }
      if (!progress.failedStep) {
        progress.failedStep = state === PROMOTION_STATES.CREDENTIALS_INSTALLED ? 'connect' : 'credentials';
        progress.error = message;
      }
      if (state !== PROMOTION_STATES.FAILED) {
        machine.fail(message);
      }
    } finally {
      await held?.release();
    }

    machine.transition(PROMOTION_STATES.CREDENTIALS_CLEANED);

    if (!credentialsRemoved && !progress.error) {
      progress.error = 'Credential directory could not be removed';
    }

    const result: PromotionResult = {
      success: !progress.failedStep && credentialsRemoved,
      refName,
      target: targetName,
      steps: progress.steps,
      failedStep: progress.failedStep,
      remoteOutcome: progress.outcome,
      transitions: machine.getTransitions(),
      credentialsRemoved,
      error: progress.error,
      durationMs: Date.now() - startTime,
    };

    if (result.success) {
      this.logger.info({ runId, refName, durationMs: result.durationMs }, 'Promotion complete');
    } else {
      this.logger.error({
        runId,
        refName,
        failedStep: result.failedStep,
        remoteOutcome: result.remoteOutcome,
        credentialsRemoved,
        error: result.error,
      }, 'Promotion failed');
    }

    return result;
  }

  /**
   * Drive the remote steps, stopping at the first failure
   */
  private async applyRemote(
    session: RemoteSession,
    machine: PromotionStateMachine,
    refName: string,
    progress: RunProgress
  ): Promise<void> {
    let current: FailedStep = 'connect';

    try {
      await session.connect();

      if (this.config.commandMode === 'chained') {
        current = 'chained';
        await this.runStep(session, 'chained', renderChainedCommand(this.target, refName), progress);
        machine.transition(PROMOTION_STATES.SERVICE_RESTARTED);
        return;
      }

      const step = async (name: StepwiseRemoteStep): Promise<void> => {
        current = name;
        await this.runStep(session, name, renderStepCommand(name, this.target, refName), progress);
      };

      await step('checkout');
      await step('pull');
      machine.transition(PROMOTION_STATES.REMOTE_SYNCED);

      await step('build');
      machine.transition(PROMOTION_STATES.REMOTE_REBUILT);

      await step('restart');
      machine.transition(PROMOTION_STATES.SERVICE_RESTARTED);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      progress.failedStep = current;
      progress.error = message;
      if (current === 'chained') {
        // The chained line gives no hint of how far it got
        progress.outcome = 'unknown';
      }
      machine.fail(message);
    }
  }

  private async runStep(
    session: RemoteSession,
    step: RemoteStep,
    command: string,
    progress: RunProgress
  ): Promise<void> {
    this.logger.info({ step, command }, 'Running remote step');

    const result = await session.exec(command);
    const stepResult: RemoteStepResult = {
      step,
      command,
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      durationMs: result.durationMs,
    };
    progress.steps.push(stepResult);
    this.emit('step:completed', stepResult);

    if (result.exitCode !== 0) {
      throw new RemoteCommandError(step, result.exitCode, tailLines(result.stderr, 5));
    }

    progress.outcome = OUTCOME_AFTER[step];
    this.logger.info({ step, durationMs: result.durationMs }, 'Remote step succeeded');
  }
}
