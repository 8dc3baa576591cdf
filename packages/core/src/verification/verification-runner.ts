/**
 * Verification Runner
 * Runs compile, format, lint and test checks concurrently against one source revision.
 * Stages share nothing but the read-only source tree; only their conjunction matters.
 */

import { EventEmitter } from 'eventemitter3';
import {
  createChildLogger,
  logStageResult,
  runCommand,
  tailLines,
  type CommandExecutor,
  type CommandOutput,
  type Logger,
  type StageResult,
  type StageStatus,
} from '@deckhand/shared';
import type {
  StageDefinition,
  VerificationRunnerConfig,
  VerificationRunnerDeps,
  VerificationRunnerEvents,
  VerificationSummary,
} from './types.js';
import { buildStageDefinitions } from './stages.js';

const DEFAULT_RUNNER_CONFIG: VerificationRunnerConfig = {
  sourceDir: '.',
  stages: buildStageDefinitions(),
  failFast: false,
  outputTailLines: 40,
};

export class VerificationRunner extends EventEmitter<VerificationRunnerEvents> {
  private config: VerificationRunnerConfig;
  private executor: CommandExecutor;
  private logger: Logger;

  constructor(config: Partial<VerificationRunnerConfig> = {}, deps: VerificationRunnerDeps = {}) {
    super();
    this.config = { ...DEFAULT_RUNNER_CONFIG, ...config };
    this.executor = deps.executor ?? runCommand;
    this.logger = deps.logger ?? createChildLogger({ component: 'VerificationRunner' });
  }

  get stages(): readonly StageDefinition[] {
    return this.config.stages;
  }

  /**
   * Run every stage. Never rejects; a stage that cannot run is a failed stage.
   */
  async runAll(runId: string = 'local'): Promise<VerificationSummary> {
    const startTime = Date.now();
    const controller = new AbortController();

    this.logger.info({
      runId,
      sourceDir: this.config.sourceDir,
      stages: this.config.stages.map((definition) => definition.stage),
      failFast: this.config.failFast,
    }, 'Starting verification');

    const results = await Promise.all(
      this.config.stages.map(async (definition) => {
        const result = await this.runStage(definition, controller.signal, runId);
        if (result.status === 'failed' && this.config.failFast && !controller.signal.aborted) {
          this.logger.info({ stage: definition.stage }, 'Cancelling remaining stages');
          controller.abort();
        }
        return result;
      })
    );

    const failedStages = results
      .filter((result) => result.status !== 'passed')
      .map((result) => result.stage);

    const summary: VerificationSummary = {
      passed: failedStages.length === 0,
      results,
      failedStages,
      durationMs: Date.now() - startTime,
    };

    this.logger.info({
      runId,
      passed: summary.passed,
      failedStages,
      durationMs: summary.durationMs,
    }, 'Verification complete');

    return summary;
  }

  /**
   * Run a single stage
   */
  async runStage(definition: StageDefinition, signal?: AbortSignal, runId: string = 'local'): Promise<StageResult> {
    this.emit('stage:started', definition);
    this.logger.debug({ stage: definition.stage, command: definition.command }, 'Starting stage');

    const output = await this.executor({
      command: definition.command,
      shell: true,
      cwd: this.config.sourceDir,
      timeoutMs: definition.timeoutMs,
      signal,
    });

    const status = this.statusOf(output);
    const result: StageResult = {
      stage: definition.stage,
      status,
      command: definition.command,
      exitCode: output.exitCode,
      output: tailLines(`${output.stdout}${output.stderr}`, this.config.outputTailLines),
      error: status === 'passed' ? undefined : this.describeFailure(definition, output),
      durationMs: output.durationMs,
    };

    logStageResult(runId, result.stage, result.status, result.durationMs);
    this.emit('stage:completed', result);
    return result;
  }

  private statusOf(output: CommandOutput): StageStatus {
    if (output.cancelled) return 'cancelled';
    if (output.timedOut || output.exitCode !== 0) return 'failed';
    return 'passed';
  }

  private describeFailure(definition: StageDefinition, output: CommandOutput): string {
    if (output.cancelled) return 'Cancelled after another stage failed';
    if (output.timedOut) return `Timed out after ${definition.timeoutMs}ms`;
    if (output.error) return output.error;
    return `Exit code ${output.exitCode ?? 'none'}`;
  }
}
