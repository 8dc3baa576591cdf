/**
 * runCommand against real shell processes
 */
import { describe, it, expect } from 'vitest';
import { runCommand } from './index.js';

describe('runCommand with a real shell', () => {
  it('should return promptly when a shell command line times out', async () => {
    const output = await runCommand({ command: 'sleep 3; true', shell: true, timeoutMs: 200 });

    expect(output.timedOut).toBe(true);
    expect(output.durationMs).toBeLessThan(2000);
  });

  it('should return promptly when a shell command line is aborted', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);

    const output = await runCommand({ command: 'sleep 3; true', shell: true, signal: controller.signal });

    expect(output.cancelled).toBe(true);
    expect(output.durationMs).toBeLessThan(2000);
  });

  it('should keep multi-byte characters intact', async () => {
    const output = await runCommand({ command: "printf 'd\\303\\251ploy\\n'", shell: true });

    expect(output.exitCode).toBe(0);
    expect(output.stdout).toBe('déploy\n');
  });
});
