/**
 * SSH session tests
 */
import { describe, it, expect, vi } from 'vitest';
import { SshConnectionError, type CommandOutput, type CommandSpec, type RemoteTarget } from '@deckhand/shared';
import type { CredentialBundle } from './credential-bundle.js';
import { SshSession } from './ssh-session.js';

const target: RemoteTarget = {
  host: 'deploy.example.test',
  user: 'deployer',
  port: 22,
  workDir: '/srv/jab3',
  buildCommand: 'cargo',
  buildArgs: ['build', '--release'],
  serviceName: 'jab3',
  useSudo: false,
};

const bundle: CredentialBundle = {
  dir: '/tmp/bundle',
  identityFile: '/tmp/bundle/id_rsa',
  knownHostsFile: '/tmp/bundle/known_hosts',
  controlPath: '/tmp/bundle/control.sock',
};

const output = (overrides: Partial<CommandOutput> = {}): CommandOutput => ({
  exitCode: 0,
  stdout: '',
  stderr: '',
  durationMs: 5,
  timedOut: false,
  cancelled: false,
  ...overrides,
});

const BASE_ARGS = [
  '-i', '/tmp/bundle/id_rsa',
  '-p', '22',
  '-o', 'IdentitiesOnly=yes',
  '-o', 'UserKnownHostsFile=/tmp/bundle/known_hosts',
  '-o', 'StrictHostKeyChecking=yes',
  '-o', 'BatchMode=yes',
  '-o', 'ConnectTimeout=30',
  '-o', 'ControlPath=/tmp/bundle/control.sock',
];

describe('SshSession', () => {
  it('should open a background master connection', async () => {
    const executor = vi.fn(async (_spec: CommandSpec) => output());
    const session = new SshSession(target, bundle, { executor });

    await session.connect();

    expect(session.isOpen()).toBe(true);
    expect(executor).toHaveBeenCalledWith({
      command: 'ssh',
      args: [...BASE_ARGS, '-o', 'ControlMaster=yes', '-o', 'ControlPersist=yes', '-f', '-N', 'deployer@deploy.example.test'],
      timeoutMs: 35000,
    });
  });

  it('should fail with SshConnectionError when the connection is refused', async () => {
    const executor = vi.fn(async (_spec: CommandSpec) =>
      output({ exitCode: 255, stderr: 'deployer@deploy.example.test: Permission denied (publickey).\n' })
    );
    const session = new SshSession(target, bundle, { executor });

    const error = await session.connect().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SshConnectionError);
    expect(error).toHaveProperty(
      'message',
      'SSH connection to deployer@deploy.example.test failed: deployer@deploy.example.test: Permission denied (publickey).'
    );
    expect(session.isOpen()).toBe(false);
  });

  it('should refuse to run commands before connecting', async () => {
    const session = new SshSession(target, bundle, { executor: vi.fn(async (_spec: CommandSpec) => output()) });

    await expect(session.exec('git pull')).rejects.toThrow(SshConnectionError);
  });

  it('should run each command through the master connection', async () => {
    const executor = vi.fn(async (_spec: CommandSpec) => output({ stdout: 'Already up to date.\n' }));
    const session = new SshSession(target, bundle, { executor, commandTimeoutMs: 60000 });
    await session.connect();

    const result = await session.exec('cd /srv/jab3 && git pull');

    expect(result).toEqual({
      command: 'cd /srv/jab3 && git pull',
      exitCode: 0,
      stdout: 'Already up to date.\n',
      stderr: '',
      durationMs: 5,
    });
    expect(executor).toHaveBeenLastCalledWith({
      command: 'ssh',
      args: [...BASE_ARGS, '-o', 'ControlMaster=no', 'deployer@deploy.example.test', 'cd /srv/jab3 && git pull'],
      timeoutMs: 60000,
    });
  });

  it('should report a killed command with the ssh failure code', async () => {
    const executor = vi.fn(async (_spec: CommandSpec) => output());
    const session = new SshSession(target, bundle, { executor, commandTimeoutMs: 1000 });
    await session.connect();

    executor.mockResolvedValueOnce(output({ exitCode: null, timedOut: true, stderr: 'partial' }));
    const result = await session.exec('cargo build --release');

    expect(result.exitCode).toBe(255);
    expect(result.stderr).toBe('partial\nTimed out after 1000ms');
  });

  it('should close the master connection once', async () => {
    const executor = vi.fn(async (_spec: CommandSpec) => output());
    const session = new SshSession(target, bundle, { executor });
    await session.connect();

    await session.close();
    await session.close();

    expect(executor).toHaveBeenCalledTimes(2);
    expect(executor).toHaveBeenLastCalledWith({
      command: 'ssh',
      args: [...BASE_ARGS, '-O', 'exit', 'deployer@deploy.example.test'],
      timeoutMs: 10000,
    });
    expect(session.isOpen()).toBe(false);
  });

  it('should not throw when the master connection is already gone', async () => {
    const executor = vi.fn(async (_spec: CommandSpec) => output());
    const session = new SshSession(target, bundle, { executor });
    await session.connect();

    executor.mockResolvedValueOnce(output({ exitCode: 255, stderr: 'Control socket connect: No such file' }));

    await expect(session.close()).resolves.toBeUndefined();
  });

  it('should not throw when the executor rejects on close', async () => {
    const executor = vi.fn(async (_spec: CommandSpec) => output());
    const session = new SshSession(target, bundle, { executor });
    await session.connect();

    executor.mockRejectedValueOnce(new Error('spawn ssh EAGAIN'));

    await expect(session.close()).resolves.toBeUndefined();
    expect(session.isOpen()).toBe(false);
  });
});
