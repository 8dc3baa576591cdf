/**
 * Configuration tests
 */
import { describe, it, expect } from 'vitest';
import { homedir } from 'node:os';
import { join } from 'node:path';
import {
  loadConfig,
  parseTrigger,
  requirePrivateKey,
  requireRemoteTarget,
  validateConfig,
  type Env,
} from './index.js';
import { ConfigurationError } from '../errors/index.js';

const remoteEnv: Env = {
  SSH_HOST: 'deploy.example.test',
  SSH_USER: 'deployer',
  SSH_PRIVATE_KEY: 'test-secret',
  WORK_DIR: '/srv/jab3',
  CARGO: '/home/deployer/.cargo/bin/cargo',
  SERVICE_NAME: 'jab3',
};

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.nodeEnv).toBe('production');
    expect(config.source.dir).toBe('.');
    expect(config.verification.compileCommand).toBe('cargo check');
    expect(config.verification.formatCommand).toBe('cargo +nightly fmt --all -- --check');
    expect(config.verification.lintCommand).toBe('cargo clippy --all-features');
    expect(config.verification.testCommand).toBe('cargo test --workspace');
    expect(config.verification.denyWarnings).toBe(true);
    expect(config.verification.failFast).toBe(false);
    expect(config.image.runtimePackages).toEqual(['libssl-dev', 'ca-certificates']);
    expect(config.remote.port).toBe(22);
    expect(config.remote.buildArgs).toEqual(['build', '--release']);
    expect(config.remote.commandMode).toBe('stepwise');
    expect(config.pipeline.promoteOn).toEqual(['manual']);
  });

  it('should keep "false" false', () => {
    const config = loadConfig({ LINT_DENY_WARNINGS: 'false', FAIL_FAST: 'true' });

    expect(config.verification.denyWarnings).toBe(false);
    expect(config.verification.failFast).toBe(true);
  });

  it('should parse the promotion triggers list', () => {
    const config = loadConfig({ PROMOTE_ON: 'manual, push' });
    expect(config.pipeline.promoteOn).toEqual(['manual', 'push']);
  });

  it('should reject unknown promotion triggers', () => {
    expect(() => loadConfig({ PROMOTE_ON: 'nightly' })).toThrow();
  });

  it('should read the remote secrets', () => {
    const config = loadConfig({ ...remoteEnv, SSH_PORT: '2222', CARGO_BUILD_ARGS: 'build  --release --locked' });

    expect(config.remote.host).toBe('deploy.example.test');
    expect(config.remote.port).toBe(2222);
    expect(config.remote.buildArgs).toEqual(['build', '--release', '--locked']);
  });
  it('should expand a leading ~ in local directories', () => {
    const config = loadConfig({ SSH_CREDENTIAL_DIR: '~/deckhand-keys', PROMOTION_LOCK_DIR: '~' });

    expect(config.credentials.dir).toBe(join(homedir(), 'deckhand-keys'));
    expect(config.lock.dir).toBe(homedir());
  });

  it('should leave other paths and ~user forms as written', () => {
    const config = loadConfig({ SSH_CREDENTIAL_DIR: '~deployer/keys', PROMOTION_LOCK_DIR: '/var/lock/deckhand' });

    expect(config.credentials.dir).toBe('~deployer/keys');
    expect(config.lock.dir).toBe('/var/lock/deckhand');
  });
});

describe('validateConfig', () => {
  it('should report invalid values with their path', () => {
    const result = validateConfig({ SSH_PORT: '70000' });

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors?.[0]).toMatch(/^remote\.port: /);
  });

  it('should accept an empty environment', () => {
    expect(validateConfig({})).toEqual({ valid: true });
  });
});

describe('requireRemoteTarget', () => {
  it('should name every missing secret', () => {
    const config = loadConfig({ SSH_HOST: 'deploy.example.test' });

    expect(() => requireRemoteTarget(config)).toThrow(
      'Missing remote target settings: SSH_USER, WORK_DIR, CARGO, SERVICE_NAME'
    );
  });

  it('should throw a ConfigurationError', () => {
    expect(() => requireRemoteTarget(loadConfig({}))).toThrow(ConfigurationError);
  });

  it('should return a frozen target', () => {
    const target = requireRemoteTarget(loadConfig(remoteEnv));

    expect(target).toEqual({
      host: 'deploy.example.test',
      user: 'deployer',
      port: 22,
      workDir: '/srv/jab3',
      buildCommand: '/home/deployer/.cargo/bin/cargo',
      buildArgs: ['build', '--release'],
      serviceName: 'jab3',
      useSudo: false,
    });
    expect(Object.isFrozen(target)).toBe(true);
    expect(Object.isFrozen(target.buildArgs)).toBe(true);
  });
});

describe('requirePrivateKey', () => {
  it('should restore escaped newlines and end with a newline', () => {
    const config = loadConfig({ SSH_PRIVATE_KEY: 'test-secret-line-1\\ntest-secret-line-2' });
    expect(requirePrivateKey(config)).toBe('test-secret-line-1\ntest-secret-line-2\n');
  });

  it('should keep real newlines', () => {
    const config = loadConfig({ SSH_PRIVATE_KEY: 'test-secret\n' });
    expect(requirePrivateKey(config)).toBe('test-secret\n');
  });

  it('should fail when the key is missing', () => {
    expect(() => requirePrivateKey(loadConfig({}))).toThrow('Missing remote target settings: SSH_PRIVATE_KEY');
  });
});

describe('parseTrigger', () => {
  it('should map CI event names', () => {
    expect(parseTrigger('workflow_dispatch')).toBe('manual');
    expect(parseTrigger('pull_request_target')).toBe('pull_request');
    expect(parseTrigger('push')).toBe('push');
    expect(parseTrigger(' Manual ')).toBe('manual');
  });

  it('should return undefined for unknown or missing values', () => {
    expect(parseTrigger('schedule')).toBeUndefined();
    expect(parseTrigger(undefined)).toBeUndefined();
  });
});
