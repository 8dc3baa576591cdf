/**
 * SSH Session
 * One multiplexed connection (OpenSSH ControlMaster) per promotion run;
 * every remote step is a separate `ssh` call over that connection, so each
 * one reports its own exit code.
 */

import {
  SshConnectionError,
  createLogger,
  runCommand,
  tailLines,
  type CommandExecutor,
  type CommandOutput,
  type Logger,
  type RemoteTarget,
} from '@deckhand/shared';
import type { CredentialBundle } from './credential-bundle.js';
import { describeTarget } from './remote-commands.js';

/** ssh reserves exit status 255 for its own errors */
export const SSH_CONNECTION_FAILURE_EXIT_CODE = 255;

export interface SshSessionOptions {
  connectTimeoutSec?: number;
  /** Timeout for a single remote command, in ms */
  commandTimeoutMs?: number;
  executor?: CommandExecutor;
  logger?: Logger;
}

export interface RemoteExecResult {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export class SshSession {
  private readonly target: RemoteTarget;
  private readonly bundle: CredentialBundle;
  private readonly options: SshSessionOptions;
  private readonly executor: CommandExecutor;
  private readonly logger: Logger;
  private open = false;

  constructor(target: RemoteTarget, bundle: CredentialBundle, options: SshSessionOptions = {}) {
    this.target = target;
    this.bundle = bundle;
    this.options = options;
    this.executor = options.executor ?? runCommand;
    this.logger = options.logger ?? createLogger('SshSession');
  }

  get destination(): string {
    return `${this.target.user}@${this.target.host}`;
  }

  isOpen(): boolean {
    return this.open;
  }

  /**
   * Options every ssh call shares: the bundle's identity and known_hosts, no prompts
   */
  baseArgs(): string[] {
    return [
      '-i', this.bundle.identityFile,
      '-p', String(this.target.port),
      '-o', 'IdentitiesOnly=yes',
      '-o', `UserKnownHostsFile=${this.bundle.knownHostsFile}`,
      '-o', 'StrictHostKeyChecking=yes',
      '-o', 'BatchMode=yes',
      '-o', `ConnectTimeout=${this.options.connectTimeoutSec ?? 30}`,
      '-o', `ControlPath=${this.bundle.controlPath}`,
    ];
  }

  /**
   * Start the master connection in the background
   */
  async connect(): Promise<void> {
    if (this.open) return;

    this.logger.info({ target: describeTarget(this.target) }, 'Opening SSH session');

    const result = await this.executor({
      command: 'ssh',
      args: [...this.baseArgs(), '-o', 'ControlMaster=yes', '-o', 'ControlPersist=yes', '-f', '-N', this.destination],
      timeoutMs: ((this.options.connectTimeoutSec ?? 30) + 5) * 1000,
    });

    if (result.exitCode !== 0) {
      throw new SshConnectionError(
        describeTarget(this.target),
        result.error ?? (tailLines(result.stderr, 5) || `exit code ${result.exitCode ?? 'none'}`)
      );
    }

    this.open = true;
  }

  /**
   * Run one command line on the remote host through the master connection
   */
  async exec(command: string): Promise<RemoteExecResult> {
    if (!this.open) {
      throw new SshConnectionError(describeTarget(this.target), 'session is not open');
    }

    this.logger.debug({ command }, 'Running remote command');

    const result = await this.executor({
      command: 'ssh',
      args: [...this.baseArgs(), '-o', 'ControlMaster=no', this.destination, command],
      timeoutMs: this.options.commandTimeoutMs,
    });

    // A process that never started or was killed has no exit status of its own
    const exitCode = result.exitCode ?? SSH_CONNECTION_FAILURE_EXIT_CODE;

    return {
      command,
      exitCode,
      stdout: result.stdout,
      stderr: result.timedOut
        ? `${result.stderr}\nTimed out after ${this.options.commandTimeoutMs ?? 0}ms`
        : result.error ?? result.stderr,
      durationMs: result.durationMs,
    };
  }

  /**
   * Stop the master connection. Never throws; the bundle removal that follows
   * deletes the control socket either way.
   */
  async close(): Promise<void> {
    if (!this.open) return;
    this.open = false;

    let result: CommandOutput;
    try {
      result = await this.executor({
        command: 'ssh',
        args: [...this.baseArgs(), '-O', 'exit', this.destination],
        timeoutMs: 10000,
      });
    } catch (error) {
      this.logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'SSH master connection could not be stopped'
      );
      return;
    }

    if (result.exitCode !== 0) {
      this.logger.warn(
        { exitCode: result.exitCode, stderr: tailLines(result.stderr, 3) },
        'SSH master connection did not exit cleanly'
      );
    } else {
      this.logger.info({ target: describeTarget(this.target) }, 'SSH session closed');
    }
  }
}
