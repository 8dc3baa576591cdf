/**
 * Child process execution
 * Every external tool (cargo, docker, ssh, ssh-keyscan) goes through a CommandExecutor,
 * so callers can be handed a fake in tests.
 */

import { spawn } from 'node:child_process';

export interface CommandSpec {
  command: string;
  args?: string[];
  cwd?: string;
  /** Run through /bin/sh; `command` is then a full command line */
  shell?: boolean;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
  /** Aborting kills the process and marks the output as cancelled */
  signal?: AbortSignal;
  onOutput?: (chunk: string, stream: 'stdout' | 'stderr') => void;
}

export interface CommandOutput {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  cancelled: boolean;
  /** Set when the process could not be started */
  error?: string;
}

export type CommandExecutor = (spec: CommandSpec) => Promise<CommandOutput>;

/**
 * Human-readable form of a command, for logs and results
 */
export function formatCommand(spec: Pick<CommandSpec, 'command' | 'args'>): string {
  return [spec.command, ...(spec.args ?? [])].join(' ');
}

/**
 * Keep the last `maxLines` lines of a process output
 */
export function tailLines(output: string, maxLines = 40): string {
  const lines = output.trimEnd().split('\n');
  return lines.slice(-maxLines).join('\n');
}

// Grace period between SIGTERM and SIGKILL for a process group that ignores SIGTERM
const KILL_GRACE_MS = 5000;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Run a command to completion. Never rejects: spawn failures, timeouts and
 * cancellation are reported on the output.
 *
 * The child leads its own process group, so a timeout or abort reaches everything a
 * shell command line started, not only the shell.
 */
export const runCommand: CommandExecutor = (spec) => {
  const startTime = Date.now();

  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let cancelled = false;
    let settled = false;
    let timer: NodeJS.Timeout | null = null;
    let killTimer: NodeJS.Timeout | null = null;

    const finish = (exitCode: number | null, error?: string): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      spec.signal?.removeEventListener('abort', onAbort);
      resolve({
        exitCode,
        stdout,
        stderr,
        durationMs: Date.now() - startTime,
        timedOut,
        cancelled,
        error,
      });
    };

    if (spec.signal?.aborted) {
      cancelled = true;
      finish(null, 'Cancelled before start');
      return;
    }

    const proc = spawn(spec.command, spec.args ?? [], {
      cwd: spec.cwd,
      env: spec.env ?? process.env,
      shell: spec.shell ?? false,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });

    const killGroup = (signal: NodeJS.Signals): void => {
      if (proc.pid === undefined) return;
      try {
        process.kill(-proc.pid, signal);
      } catch (error) {
        // ESRCH: the group is already gone
        if (!isErrnoException(error) || error.code !== 'ESRCH') {
          proc.kill(signal);
        }
      }
    };

    const terminate = (): void => {
      killGroup('SIGTERM');
      killTimer ??= setTimeout(() => killGroup('SIGKILL'), KILL_GRACE_MS);
    };

    function onAbort(): void {
      cancelled = true;
      terminate();
    }

    spec.signal?.addEventListener('abort', onAbort, { once: true });

    if (spec.timeoutMs !== undefined) {
      timer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, spec.timeoutMs);
    }

    // Decode as a stream so multi-byte characters split across chunks survive
    proc.stdout?.setEncoding('utf8');
    proc.stderr?.setEncoding('utf8');

    proc.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
      spec.onOutput?.(chunk, 'stdout');
    });

    proc.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
      spec.onOutput?.(chunk, 'stderr');
    });

    proc.on('exit', (exitCode) => {
      // A killed command may leave descendants holding the pipes open; do not wait for them
      if (timedOut || cancelled) {
        proc.stdout?.destroy();
        proc.stderr?.destroy();
        finish(exitCode);
      }
    });

    proc.on('close', (exitCode) => {
      finish(exitCode);
    });

    proc.on('error', (error) => {
      finish(null, error.message);
    });
  });
};
