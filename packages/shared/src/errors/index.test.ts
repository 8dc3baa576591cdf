/**
 * Error hierarchy tests
 */
import { describe, it, expect } from 'vitest';
import {
  CommandError,
  DeckhandError,
  InvalidTransitionError,
  PromotionLockedError,
  RemoteCommandError,
  SshConnectionError,
  isRetryableError,
  wrapError,
} from './index.js';

describe('DeckhandError', () => {
  it('should carry code and context', () => {
    const error = new RemoteCommandError('pull', 1, 'fatal: not a git repository\n');

    expect(error).toBeInstanceOf(DeckhandError);
    expect(error.code).toBe('E3003');
    expect(error.step).toBe('pull');
    expect(error.exitCode).toBe(1);
    expect(error.message).toBe('Remote pull failed with exit code 1: fatal: not a git repository');
    expect(error.context.category).toBe('REMOTE');
  });

  it('should serialise to JSON', () => {
    const error = new SshConnectionError('deployer@deploy.example.test', 'Connection refused');
    const json = error.toJSON();

    expect(json.name).toBe('SshConnectionError');
    expect(json.code).toBe('E3002');
    expect(json.message).toBe('SSH connection to deployer@deploy.example.test failed: Connection refused');
  });

  it('should describe a lock holder', () => {
    const error = new PromotionLockedError('deployer@deploy.example.test:/srv/jab3', new Date('2026-01-01T00:00:00.000Z'));
    expect(error.message).toBe(
      'Promotion for deployer@deploy.example.test:/srv/jab3 is already running (since 2026-01-01T00:00:00.000Z)'
    );
  });

  it('should format commands without an exit code', () => {
    const error = new CommandError('cargo test', null, 'killed');
    expect(error.message).toBe('Command failed (no exit code): cargo test: killed');
  });
});

describe('isRetryableError', () => {
  it('should treat pipeline failures as fatal', () => {
    expect(isRetryableError(new InvalidTransitionError('idle', 'remote_synced'))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });
});

describe('wrapError', () => {
  it('should pass Deckhand errors through', () => {
    const error = new CommandError('cargo check', 101);
    expect(wrapError(error)).toBe(error);
  });

  it('should wrap plain errors and values', () => {
    const wrapped = wrapError(new TypeError('bad input'), { stage: 'lint' });
    expect(wrapped.code).toBe('E9999');
    expect(wrapped.message).toBe('bad input');
    expect(wrapped.context.originalError).toBe('TypeError');
    expect(wrapped.context.stage).toBe('lint');

    expect(wrapError('text').message).toBe('text');
  });
});
