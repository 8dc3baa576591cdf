/**
 * Remote command lines for each promotion step
 */

import type { RemoteStep, RemoteTarget } from '@deckhand/shared';
import { quotePath, shellQuote } from './quote.js';

export type StepwiseRemoteStep = Exclude<RemoteStep, 'chained'>;

function inWorkDir(target: RemoteTarget, command: string): string {
  return `cd ${quotePath(target.workDir)} && ${command}`;
}

// The build command is the remote tool path and is passed through as written
function buildInvocation(target: RemoteTarget): string {
  return [target.buildCommand, ...target.buildArgs.map(shellQuote)].join(' ');
}

function restartInvocation(target: RemoteTarget): string {
  const restart = `systemctl restart ${shellQuote(target.serviceName)}`;
  return target.useSudo ? `sudo -n ${restart}` : restart;
}

/**
 * Command line for one step, run in its own remote call
 */
export function renderStepCommand(step: StepwiseRemoteStep, target: RemoteTarget, refName: string): string {
  switch (step) {
    case 'checkout':
      return inWorkDir(target, `git checkout -f ${shellQuote(refName)}`);
    case 'pull':
      return inWorkDir(target, 'git pull');
    case 'build':
      return inWorkDir(target, buildInvocation(target));
    case 'restart':
      return restartInvocation(target);
  }
}

/**
 * The single conjunctive command line: each segment runs only if the previous one succeeded
 */
export function renderChainedCommand(target: RemoteTarget, refName: string): string {
  return [
    `cd ${quotePath(target.workDir)}`,
    `git checkout -f ${shellQuote(refName)}`,
    'git pull',
    buildInvocation(target),
    restartInvocation(target),
  ].join(' && ');
}

/**
 * `user@host` destination, plus `:port` when not the default, for logs and lock keys
 */
export function describeTarget(target: RemoteTarget): string {
  const destination = `${target.user}@${target.host}`;
  return target.port === 22 ? destination : `${destination}:${target.port}`;
}
