/**
 * Credential Bundle
 * Materialises an SSH identity for exactly one promotion run and removes it afterwards,
 * on normal return, on a thrown error and on SIGINT/SIGTERM.
 */

import { chmod, mkdir, mkdtemp, rm, stat, writeFile } from 'node:fs/promises';
import { rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CredentialError,
  createLogger,
  onTermination,
  runCommand,
  tailLines,
  type CommandExecutor,
  type Logger,
  type RemoteTarget,
} from '@deckhand/shared';

export interface CredentialBundle {
  dir: string;
  identityFile: string;
  knownHostsFile: string;
  /** ControlMaster socket; lives in `dir` so removing the bundle removes it too */
  controlPath: string;
}

export interface CredentialManagerOptions {
  /** Fixed directory for the bundle. It must not exist yet. */
  dir?: string;
  keyFileName?: string;
  executor?: CommandExecutor;
  logger?: Logger;
  /** Timeout for ssh-keyscan, in ms */
  keyscanTimeoutMs?: number;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export class CredentialManager {
  private readonly options: CredentialManagerOptions;
  private readonly executor: CommandExecutor;
  private readonly logger: Logger;
  /** Termination guards of installed bundles, by directory */
  private readonly guards = new Map<string, () => void>();

  constructor(options: CredentialManagerOptions = {}) {
    this.options = options;
    this.executor = options.executor ?? runCommand;
    this.logger = options.logger ?? createLogger('CredentialManager');
  }

  /**
   * Write the private key (mode 0600) and seed known_hosts for the target host.
   * The directory is guarded against termination from before the key is written
   * until `remove`.
   */
  async install(target: RemoteTarget, privateKey: string): Promise<CredentialBundle> {
    const dir = await this.createDirectory();
    this.guards.set(dir, guardTermination(dir));
    const bundle: CredentialBundle = {
      dir,
      identityFile: join(dir, this.options.keyFileName ?? 'id_rsa'),
      knownHostsFile: join(dir, 'known_hosts'),
      controlPath: join(dir, 'control.sock'),
    };

    try {
      await writeFile(bundle.identityFile, privateKey, { mode: 0o600 });
      // writeFile's mode is subject to the umask
      await chmod(bundle.identityFile, 0o600);

      const keyscan = await this.executor({
        command: 'ssh-keyscan',
        args: ['-H', '-p', String(target.port), target.host],
        timeoutMs: this.options.keyscanTimeoutMs ?? 30000,
      });

      if (keyscan.exitCode !== 0 || keyscan.stdout.trim() === '') {
        throw new CredentialError(`ssh-keyscan found no host key for ${target.host}`, {
          host: target.host,
          exitCode: keyscan.exitCode,
          stderr: tailLines(keyscan.stderr, 5),
          spawnError: keyscan.error,
        });
      }

      await writeFile(bundle.knownHostsFile, keyscan.stdout, { mode: 0o644 });
    } catch (error) {
      await this.remove(bundle);
      throw error instanceof CredentialError
        ? error
        : new CredentialError(
            `Failed to install credentials: ${error instanceof Error ? error.message : String(error)}`
          );
    }

    this.logger.info({ dir, host: target.host }, 'Credentials installed');
    return bundle;
  }

  /**
   * Remove the bundle directory. Safe to call more than once.
   */
  async remove(bundle: CredentialBundle): Promise<boolean> {
    await rm(bundle.dir, { recursive: true, force: true });
    const removed = !(await pathExists(bundle.dir));
    if (removed) {
      this.guards.get(bundle.dir)?.();
      this.guards.delete(bundle.dir);
    }
    if (removed) {
      this.logger.info({ dir: bundle.dir }, 'Credentials removed');
    } else {
      this.logger.error({ dir: bundle.dir }, 'Credential directory still present after removal');
    }
    return removed;
  }

  private async createDirectory(): Promise<string> {
    const fixedDir = this.options.dir;
    if (!fixedDir) {
      return mkdtemp(join(tmpdir(), 'deckhand-ssh-'));
    }

    // Adopting an existing directory would delete whatever was in it on cleanup
    if (await pathExists(fixedDir)) {
      throw new CredentialError(`Credential directory ${fixedDir} already exists`, { dir: fixedDir });
    }
    await mkdir(fixedDir, { recursive: true, mode: 0o700 });
    return fixedDir;
  }
}

/**
 * Remove `dir` synchronously if the process is told to terminate while it exists.
 * Returns the function that unregisters the guard.
 */
export function guardTermination(dir: string): () => void {
  return onTermination(() => rmSync(dir, { recursive: true, force: true }));
}

/**
 * Acquire a bundle, run `body`, release the bundle on every exit path.
 * `onReleased` runs after removal, whether `body` returned or threw.
 */
export async function withCredentialBundle<T>(
  manager: CredentialManager,
  target: RemoteTarget,
  privateKey: string,
  body: (bundle: CredentialBundle) => Promise<T>,
  onReleased?: (removed: boolean) => void
): Promise<T> {
  const bundle = await manager.install(target, privateKey);

  let removed = false;
  try {
    return await body(bundle);
  } finally {
    try {
      removed = await manager.remove(bundle);
    } finally {
      onReleased?.(removed);
    }
  }
}
