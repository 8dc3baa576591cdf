/**
 * Wire components from configuration
 */

import { posix } from 'node:path';
import {
  requirePrivateKey,
  requireRemoteTarget,
  type CommandExecutor,
  type Config,
} from '@deckhand/shared';
import { CredentialManager, SshSession } from '@deckhand/ssh';
import { ImageBuilder } from './build/index.js';
import { VerificationRunner, buildStageDefinitions } from './verification/index.js';
import { FileLockStore, PromotionLock } from './lock/index.js';
import { PromotionStage } from './promotion/index.js';
import { PipelineOrchestrator } from './orchestrator/index.js';

export interface FactoryDeps {
  /** Runs every local process, ssh included */
  executor?: CommandExecutor;
}

export function createImageBuilder(config: Config, deps: FactoryDeps = {}): ImageBuilder {
  const { image } = config;
  return new ImageBuilder(
    {
      registry: image.registry,
      buildTimeout: image.buildTimeoutMs,
      recipe: {
        builderImage: image.builderImage,
        builderStageName: 'builder',
        compileCommand: image.compileCommand,
        runtimeImage: image.runtimeImage,
        runtimePackages: image.runtimePackages,
        artifact: {
          binaryName: image.binaryName,
          path: posix.join(image.artifactDir, image.binaryName),
        },
      },
    },
    { executor: deps.executor }
  );
}

export function createVerificationRunner(config: Config, deps: FactoryDeps = {}): VerificationRunner {
  const { verification } = config;
  return new VerificationRunner(
    {
      sourceDir: config.source.dir,
      stages: buildStageDefinitions(verification),
      failFast: verification.failFast,
    },
    { executor: deps.executor }
  );
}

/**
 * Throws ConfigurationError when a remote secret is missing
 */
export function createPromotionStage(config: Config, deps: FactoryDeps = {}): PromotionStage {
  const target = requireRemoteTarget(config);
  const privateKey = requirePrivateKey(config);
  const { remote } = config;

  return new PromotionStage(
    target,
    privateKey,
    {
      commandMode: remote.commandMode,
      connectTimeoutSec: remote.connectTimeoutSec,
      commandTimeoutMs: remote.commandTimeoutMs,
    },
    {
      credentials: new CredentialManager({
        dir: config.credentials.dir,
        keyFileName: config.credentials.keyFileName,
        executor: deps.executor,
      }),
      sessionFactory: (sessionTarget, bundle) => new SshSession(sessionTarget, bundle, {
        connectTimeoutSec: remote.connectTimeoutSec,
        commandTimeoutMs: remote.commandTimeoutMs,
        executor: deps.executor,
      }),
      lock: new PromotionLock({
        store: new FileLockStore(config.lock.dir, { unreadableTtlMs: config.lock.timeoutMs }),
        timeoutMs: config.lock.timeoutMs,
      }),
    }
  );
}

export function createPipelineOrchestrator(config: Config, deps: FactoryDeps = {}): PipelineOrchestrator {
  return new PipelineOrchestrator(
    {
      verification: createVerificationRunner(config, deps),
      promotionFactory: () => createPromotionStage(config, deps),
    },
    { promoteOn: config.pipeline.promoteOn }
  );
}
