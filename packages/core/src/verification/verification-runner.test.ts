/**
 * Verification Runner tests
 */
import { describe, it, expect, vi } from 'vitest';
import type { CommandOutput, CommandSpec, StageResult } from '@deckhand/shared';
import { VerificationRunner } from './verification-runner.js';
import { buildStageDefinitions } from './stages.js';

const output = (overrides: Partial<CommandOutput> = {}): CommandOutput => ({
  exitCode: 0,
  stdout: '',
  stderr: '',
  durationMs: 5,
  timedOut: false,
  cancelled: false,
  ...overrides,
});

const isLint = (spec: CommandSpec): boolean => spec.command.startsWith('cargo clippy');

describe('VerificationRunner', () => {
  it('should run every stage in the source tree through the shell', async () => {
    const executor = vi.fn(async (_spec: CommandSpec) => output({ stdout: 'ok\n' }));
    const runner = new VerificationRunner({ sourceDir: '/src/jab3' }, { executor });

    const summary = await runner.runAll('run-1');

    expect(summary.passed).toBe(true);
    expect(summary.failedStages).toEqual([]);
    expect(summary.results.map((result) => result.stage)).toEqual(['compile', 'format', 'lint', 'test']);
    expect(executor).toHaveBeenCalledTimes(4);
    expect(executor).toHaveBeenCalledWith(expect.objectContaining({
      command: 'cargo check',
      shell: true,
      cwd: '/src/jab3',
      timeoutMs: 1800000,
    }));
  });

  it('should start all stages before any finishes', async () => {
    const pending: Array<(value: CommandOutput) => void> = [];
    const executor = vi.fn((_spec: CommandSpec) => new Promise<CommandOutput>((resolve) => pending.push(resolve)));
    const runner = new VerificationRunner({}, { executor });

    const summaryPromise = runner.runAll();
    expect(executor).toHaveBeenCalledTimes(4);

    for (const resolve of pending) resolve(output());
    expect((await summaryPromise).passed).toBe(true);
  });

  it('should fail the run when one stage fails and still run the rest', async () => {
    const executor = vi.fn(async (spec: CommandSpec) =>
      isLint(spec) ? output({ exitCode: 101, stderr: 'warning: unused variable\nerror: could not compile\n' }) : output()
    );
    const runner = new VerificationRunner({}, { executor });

    const summary = await runner.runAll();

    expect(summary.passed).toBe(false);
    expect(summary.failedStages).toEqual(['lint']);
    const lint = summary.results.find((result) => result.stage === 'lint');
    expect(lint).toMatchObject({
      status: 'failed',
      exitCode: 101,
      error: 'Exit code 101',
      output: 'warning: unused variable\nerror: could not compile',
    });
    expect(summary.results.filter((result) => result.status === 'passed')).toHaveLength(3);
  });

  it('should cancel the other stages in fail-fast mode', async () => {
    const executor = vi.fn((spec: CommandSpec) => {
      if (isLint(spec)) return Promise.resolve(output({ exitCode: 1 }));
      return new Promise<CommandOutput>((resolve) => {
        spec.signal?.addEventListener('abort', () => resolve(output({ exitCode: null, cancelled: true })));
      });
    });
    const runner = new VerificationRunner({ failFast: true }, { executor });

    const summary = await runner.runAll();

    expect(summary.results.map((result) => result.status)).toEqual(['cancelled', 'cancelled', 'failed', 'cancelled']);
    expect(summary.failedStages).toEqual(['compile', 'format', 'lint', 'test']);
    expect(summary.results[0]?.error).toBe('Cancelled after another stage failed');
  });

  it('should describe timeouts and spawn errors', async () => {
    const executor = vi.fn(async (spec: CommandSpec) => {
      if (spec.command === 'cargo test --workspace') return output({ exitCode: null, timedOut: true });
      if (spec.command === 'cargo check') return output({ exitCode: null, error: 'spawn /bin/sh ENOENT' });
      return output();
    });
    const runner = new VerificationRunner({ stages: buildStageDefinitions({ stageTimeoutMs: 1000 }) }, { executor });

    const summary = await runner.runAll();

    expect(summary.results.find((result) => result.stage === 'test')?.error).toBe('Timed out after 1000ms');
    expect(summary.results.find((result) => result.stage === 'compile')?.error).toBe('spawn /bin/sh ENOENT');
  });

  it('should keep only the tail of the output', async () => {
    const lines = Array.from({ length: 10 }, (_, i) => `line ${i + 1}`).join('\n');
    const runner = new VerificationRunner(
      { outputTailLines: 2 },
      { executor: vi.fn(async (_spec: CommandSpec) => output({ stdout: `${lines}\n` })) }
    );

    const result = await runner.runStage({ stage: 'test', command: 'cargo test', timeoutMs: 1000 });

    expect(result.output).toBe('line 9\nline 10');
  });

  it('should emit stage events', async () => {
    const runner = new VerificationRunner({}, { executor: vi.fn(async (_spec: CommandSpec) => output()) });
    const started: string[] = [];
    const completed: StageResult[] = [];
    runner.on('stage:started', (definition) => started.push(definition.stage));
    runner.on('stage:completed', (result) => completed.push(result));

    await runner.runAll();

    expect(started).toEqual(['compile', 'format', 'lint', 'test']);
    expect(completed).toHaveLength(4);
  });
});
