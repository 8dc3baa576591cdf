/**
 * Pipeline Orchestrator tests
 * Real verification runner and promotion stage over fake processes and a fake remote session.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  PromotionGateError,
  PromotionLockedError,
  type CommandOutput,
  type CommandSpec,
  type PipelineRun,
  type RemoteTarget,
} from '@deckhand/shared';
import { CredentialManager, type RemoteExecResult } from '@deckhand/ssh';
import { VerificationRunner } from '../verification/index.js';
import { MemoryLockStore, PromotionLock } from '../lock/index.js';
import { PromotionStage, type RemoteSession } from '../promotion/index.js';
import { PipelineOrchestrator } from './pipeline-orchestrator.js';

const target: RemoteTarget = Object.freeze({
  host: 'deploy.example.test',
  user: 'deployer',
  port: 22,
  workDir: '/srv/jab3',
  buildCommand: 'cargo',
  buildArgs: ['build', '--release'],
  serviceName: 'jab3',
  useSudo: false,
});

const output = (overrides: Partial<CommandOutput> = {}): CommandOutput => ({
  exitCode: 0,
  stdout: '',
  stderr: '',
  durationMs: 1,
  timedOut: false,
  cancelled: false,
  ...overrides,
});

describe('PipelineOrchestrator', () => {
  let parent: string;
  let failingStage: string | undefined;
  let executor: ReturnType<typeof createExecutor>;
  let remoteCommands: string[];
  let lock: PromotionLock;
  let promotionFactory: Mock<() => PromotionStage>;

  function createExecutor() {
    return vi.fn(async (spec: CommandSpec) => {
      if (spec.command === 'ssh-keyscan') {
        return output({ stdout: 'deploy.example.test ssh-ed25519 AAAAC3NzaC1lZDI1NTE5AAAAITestKey\n' });
      }
      if (failingStage && spec.command.startsWith(failingStage)) {
        return output({ exitCode: 101, stderr: 'error: could not compile `jab3`\n' });
      }
      return output();
    });
  }

  const session = (): RemoteSession => ({
    connect: async () => undefined,
    close: async () => undefined,
    exec: async (command: string): Promise<RemoteExecResult> => {
      remoteCommands.push(command);
      return { command, exitCode: 0, stdout: '', stderr: '', durationMs: 1 };
    },
  });

  const createOrchestrator = (promoteOn: Array<'pull_request' | 'push' | 'manual'> = ['manual']) =>
    new PipelineOrchestrator(
      {
        verification: new VerificationRunner({ sourceDir: parent }, { executor }),
        promotionFactory,
      },
      { promoteOn }
    );

  beforeEach(async () => {
    parent = await mkdtemp(join(tmpdir(), 'deckhand-pipeline-'));
    failingStage = undefined;
    executor = createExecutor();
    remoteCommands = [];
    lock = new PromotionLock({ store: new MemoryLockStore() });
    promotionFactory = vi.fn(() =>
      new PromotionStage(target, 'test-secret\n', {}, {
        credentials: new CredentialManager({ dir: join(parent, 'bundle'), executor }),
        sessionFactory: () => session(),
        lock,
      })
    );
  });

  afterEach(async () => {
    await rm(parent, { recursive: true, force: true });
  });

  it('should promote a manual run where every stage passed', async () => {
    const run = await createOrchestrator().run({ trigger: 'manual', revision: { refName: 'main', sha: 'abc123' } });

    expect(run.status).toBe('succeeded');
    expect(run.gate).toEqual({ promote: true, reason: 'approved', failedStages: [] });
    expect(run.promotion?.success).toBe(true);
    expect(remoteCommands).toHaveLength(4);
    expect(existsSync(join(parent, 'bundle'))).toBe(false);
  });

  it('should never start promotion when lint fails', async () => {
    failingStage = 'cargo clippy';

    const run = await createOrchestrator().run({ trigger: 'manual', revision: { refName: 'main' } });

    expect(run.status).toBe('failed');
    expect(run.gate).toEqual({ promote: false, reason: 'verification_failed', failedStages: ['lint'] });
    expect(run.promotion).toBeUndefined();
    expect(promotionFactory).not.toHaveBeenCalled();
    expect(executor).not.toHaveBeenCalledWith(expect.objectContaining({ command: 'ssh-keyscan' }));
    expect(remoteCommands).toEqual([]);
  });

  it('should succeed without promoting a push that is not eligible', async () => {
    const run = await createOrchestrator().run({ trigger: 'push', revision: { refName: 'main' } });

    expect(run.status).toBe('succeeded');
    expect(run.gate?.reason).toBe('trigger_not_eligible');
    expect(promotionFactory).not.toHaveBeenCalled();
  });

  it('should promote other triggers when configured', async () => {
    const run = await createOrchestrator(['push']).run({ trigger: 'push', revision: { refName: 'main' } });

    expect(run.promotion?.success).toBe(true);
  });

  it('should run checks only when promotion is switched off', async () => {
    const run = await createOrchestrator().run({ trigger: 'manual', revision: { refName: 'main' }, promote: false });

    expect(run.gate?.reason).toBe('promotion_disabled');
    expect(promotionFactory).not.toHaveBeenCalled();
  });

  it('should run checks only without a promotion factory', async () => {
    const orchestrator = new PipelineOrchestrator({ verification: new VerificationRunner({}, { executor }) });

    const run = await orchestrator.run({ trigger: 'manual', revision: { refName: 'main' } });

    expect(run.gate?.reason).toBe('promotion_disabled');
    expect(run.status).toBe('succeeded');
  });

  it('should fail the run when promotion fails', async () => {
    promotionFactory.mockImplementation(() =>
      new PromotionStage(target, 'test-secret\n', {}, {
        credentials: new CredentialManager({ dir: join(parent, 'bundle'), executor }),
        sessionFactory: () => ({
          ...session(),
          exec: async (command: string): Promise<RemoteExecResult> => ({
            command,
            exitCode: 1,
            stdout: '',
            stderr: 'fatal: not a git repository',
            durationMs: 1,
          }),
        }),
      })
    );

    const run = await createOrchestrator().run({ trigger: 'manual', revision: { refName: 'main' } });

    expect(run.status).toBe('failed');
    expect(run.promotion?.failedStep).toBe('checkout');
    expect(run.promotion?.credentialsRemoved).toBe(true);
  });

  it('should fail the run and rethrow when the target is locked', async () => {
    await lock.acquire(target);
    const orchestrator = createOrchestrator();
    const completed: PipelineRun[] = [];
    orchestrator.on('run:completed', (run) => completed.push(run));

    await expect(orchestrator.run({ trigger: 'manual', revision: { refName: 'main' } })).rejects.toThrow(
      PromotionLockedError
    );
    expect(completed[0]?.status).toBe('failed');
  });

  it('should emit run events in order', async () => {
    const orchestrator = createOrchestrator();
    const events: string[] = [];
    orchestrator.on('run:started', () => events.push('run:started'));
    orchestrator.on('stage:completed', ({ result }) => events.push(`stage:${result.stage}`));
    orchestrator.on('gate:decided', ({ gate }) => events.push(`gate:${gate.reason}`));
    orchestrator.on('promotion:state', ({ transition }) => events.push(`promotion:${transition.to}`));
    orchestrator.on('run:completed', (run) => events.push(`run:${run.status}`));

    await orchestrator.run({ trigger: 'manual', revision: { refName: 'main' } });

    expect(events[0]).toBe('run:started');
    expect(events.slice(1, 5).sort()).toEqual(['stage:compile', 'stage:format', 'stage:lint', 'stage:test']);
    expect(events.slice(5)).toEqual([
      'gate:approved',
      'promotion:credentials_installed',
      'promotion:remote_synced',
      'promotion:remote_rebuilt',
      'promotion:service_restarted',
      'promotion:credentials_cleaned',
      'run:succeeded',
    ]);
  });

  describe('promote', () => {
    it('should return the promoted run', async () => {
      const run = await createOrchestrator().promote({ refName: 'main' });

      expect(run.trigger).toBe('manual');
      expect(run.promotion?.success).toBe(true);
    });

    it('should throw when verification fails', async () => {
      failingStage = 'cargo test';

      await expect(createOrchestrator().promote({ refName: 'main' })).rejects.toThrow(PromotionGateError);
      await expect(createOrchestrator().promote({ refName: 'main' })).rejects.toThrow(
        'Promotion refused: verification_failed'
      );
    });
  });
});
