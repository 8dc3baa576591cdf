/**
 * Stage definition tests
 */
import { describe, it, expect } from 'vitest';
import { buildStageDefinitions, withDeniedWarnings } from './stages.js';

describe('withDeniedWarnings', () => {
  it('should append the flag after a new separator', () => {
    expect(withDeniedWarnings('cargo clippy --all-features')).toBe('cargo clippy --all-features -- -D warnings');
  });

  it('should reuse an existing separator', () => {
    expect(withDeniedWarnings('cargo clippy -- -W clippy::pedantic')).toBe(
      'cargo clippy -- -W clippy::pedantic -D warnings'
    );
  });

  it('should leave a command that already denies warnings alone', () => {
    expect(withDeniedWarnings('cargo clippy -- -D warnings')).toBe('cargo clippy -- -D warnings');
  });
});

describe('buildStageDefinitions', () => {
  it('should define the four stages in order', () => {
    const stages = buildStageDefinitions();

    expect(stages.map((definition) => definition.stage)).toEqual(['compile', 'format', 'lint', 'test']);
    expect(stages.map((definition) => definition.command)).toEqual([
      'cargo check',
      'cargo +nightly fmt --all -- --check',
      'cargo clippy --all-features -- -D warnings',
      'cargo test --workspace',
    ]);
    expect(stages.every((definition) => definition.timeoutMs === 1800000)).toBe(true);
  });

  it('should apply overrides', () => {
    const stages = buildStageDefinitions({ lintCommand: 'cargo clippy', denyWarnings: false, stageTimeoutMs: 60000 });

    expect(stages[2]).toEqual({ stage: 'lint', command: 'cargo clippy', timeoutMs: 60000 });
  });
});
