/**
 * Deckhand CLI commands
 */

import { Command } from 'commander';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ZodError } from 'zod';
import {
  ConfigurationError,
  ValidationError,
  createChildLogger,
  getConfig,
  parseTrigger,
  type CommandExecutor,
  type Config,
  type Env,
  type PipelineRun,
  type TriggerKind,
} from '@deckhand/shared';
import { LocalGitClient, type ResolveRevisionOptions, type ResolvedRevision } from '@deckhand/git';
import { createImageBuilder, createPipelineOrchestrator } from '@deckhand/core';
import { formatAnalysis, formatRun } from './report.js';

const logger = createChildLogger({ component: 'CLI' });

export const EXIT_FAILED = 1;
export const EXIT_CONFIG = 2;

export interface RevisionResolver {
  resolveRevision(repoPath: string, options?: ResolveRevisionOptions): Promise<ResolvedRevision>;
}

export interface CliDeps {
  loadConfig: () => Config;
  env: Env;
  git: RevisionResolver;
  executor?: CommandExecutor;
  write: (text: string) => void;
  setExitCode: (code: number) => void;
}

interface RunOptions {
  trigger?: string;
  ref?: string;
  source?: string;
  promote: boolean;
}

interface CheckOptions {
  ref?: string;
  source?: string;
}

interface ImageOptions {
  tag?: string;
  context?: string;
}

function defaultDeps(): CliDeps {
  return {
    loadConfig: getConfig,
    env: process.env,
    git: new LocalGitClient(),
    write: (text) => {
      process.stdout.write(text);
    },
    setExitCode: (code) => {
      process.exitCode = code;
    },
  };
}

export function createProgram(overrides: Partial<CliDeps> = {}): Command {
  const deps: CliDeps = { ...defaultDeps(), ...overrides };

  const withSource = (config: Config, source?: string): Config =>
    source ? { ...config, source: { ...config.source, dir: source } } : config;

  const exitCodeFor = (error: unknown): number =>
    error instanceof ConfigurationError || error instanceof ValidationError || error instanceof ZodError
      ? EXIT_CONFIG
      : EXIT_FAILED;

  // Every action reports its error and sets the exit code; nothing escapes to commander
  const action = <T>(handler: (options: T) => Promise<void>) => async (options: T): Promise<void> => {
    try {
      await handler(options);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ error: message }, 'Command failed');
      deps.write(`error: ${message}\n`);
      deps.setExitCode(exitCodeFor(error));
    }
  };

  const report = (run: PipelineRun): void => {
    deps.write(formatRun(run));
    deps.setExitCode(run.status === 'failed' ? EXIT_FAILED : 0);
  };

  const resolveTrigger = (value: string | undefined): TriggerKind => {
    const raw = value ?? deps.env.GITHUB_EVENT_NAME;
    if (raw === undefined) {
      throw new ValidationError('No trigger: pass --trigger or set GITHUB_EVENT_NAME');
    }
    const trigger = parseTrigger(raw);
    if (!trigger) {
      throw new ValidationError(`Unknown trigger "${raw}"`, { trigger: raw });
    }
    return trigger;
  };

  const program = new Command();

  program
    .name('deckhand')
    .description('Build, verify and promote the service')
    .version('0.1.0');

  program
    .command('run')
    .description('Run all verification stages, then promote if the gate allows it')
    .option('-t, --trigger <kind>', 'pull_request, push or manual (default: GITHUB_EVENT_NAME)')
    .option('-r, --ref <name>', 'Revision to promote (default: GITHUB_REF_NAME or the checkout)')
    .option('-s, --source <dir>', 'Source tree to verify')
    .option('--no-promote', 'Run the checks only')
    .action(action<RunOptions>(async (options) => {
      const config = withSource(deps.loadConfig(), options.source);
      const trigger = resolveTrigger(options.trigger);
      const revision = await deps.git.resolveRevision(config.source.dir, { refName: options.ref, env: deps.env });

      const orchestrator = createPipelineOrchestrator(config, { executor: deps.executor });
      report(await orchestrator.run({ trigger, revision: { refName: revision.refName, sha: revision.sha }, promote: options.promote }));
    }));

  program
    .command('check')
    .description('Run all verification stages without promoting')
    .option('-r, --ref <name>', 'Revision being checked')
    .option('-s, --source <dir>', 'Source tree to verify')
    .action(action<CheckOptions>(async (options) => {
      const config = withSource(deps.loadConfig(), options.source);
      const revision = await deps.git.resolveRevision(config.source.dir, { refName: options.ref, env: deps.env });

      const orchestrator = createPipelineOrchestrator(config, { executor: deps.executor });
      report(await orchestrator.run({
        trigger: parseTrigger(deps.env.GITHUB_EVENT_NAME) ?? 'manual',
        revision: { refName: revision.refName, sha: revision.sha },
        promote: false,
      }));
    }));

  program
    .command('promote')
    .description('Manual dispatch: verify, then promote to the remote target')
    .option('-r, --ref <name>', 'Revision to promote')
    .option('-s, --source <dir>', 'Source tree to verify')
    .action(action<CheckOptions>(async (options) => {
      const config = withSource(deps.loadConfig(), options.source);
      const revision = await deps.git.resolveRevision(config.source.dir, { refName: options.ref, env: deps.env });

      const orchestrator = createPipelineOrchestrator(config, { executor: deps.executor });
      let finished: PipelineRun | undefined;
      orchestrator.on('run:completed', (run) => {
        finished = run;
      });

      try {
        report(await orchestrator.promote({ refName: revision.refName, sha: revision.sha }));
      } catch (error) {
        if (finished) {
          deps.write(formatRun(finished));
        }
        throw error;
      }
    }));

  const image = program
    .command('image')
    .description('Container image commands');

  image
    .command('dockerfile')
    .description('Print the generated two-stage Dockerfile')
    .option('-o, --output <path>', 'Write it to a file instead')
    .action(action<{ output?: string }>(async (options) => {
      const builder = createImageBuilder(deps.loadConfig(), { executor: deps.executor });
      const content = builder.dockerfile();
      if (options.output) {
        await writeFile(options.output, content, 'utf-8');
        deps.write(`Wrote ${options.output}\n`);
      } else {
        deps.write(content);
      }
    }));

  image
    .command('lint')
    .description('Check a Dockerfile: the runtime stage must carry only the artifact')
    .argument('[file]', 'Dockerfile to check (default: <source>/Dockerfile)')
    .action(action<string | undefined>(async (file) => {
      const config = deps.loadConfig();
      const builder = createImageBuilder(config, { executor: deps.executor });
      const analysis = builder.analyze(await readFile(file ?? join(config.source.dir, 'Dockerfile'), 'utf-8'));
      deps.write(formatAnalysis(analysis));
      deps.setExitCode(analysis.ok ? 0 : EXIT_FAILED);
    }));

  image
    .command('build')
    .description('Build the runtime image')
    .option('-c, --context <dir>', 'Build context (default: SOURCE_DIR)')
    .option('--tag <tag>', 'Image tag (default: IMAGE_TAG)')
    .action(action<ImageOptions>(async (options) => {
      const config = deps.loadConfig();
      const builder = createImageBuilder(config, { executor: deps.executor });
      const result = await builder.build(
        options.context ?? config.source.dir,
        config.image.name,
        options.tag ?? config.image.tag
      );

      if (result.findings.length > 0) {
        deps.write(formatAnalysis({ stages: [], findings: result.findings, ok: result.success }));
      }
      if (result.success) {
        deps.write(`Built ${builder.reference(config.image.name, options.tag ?? config.image.tag)}${result.imageId ? ` (${result.imageId})` : ''}\n`);
        deps.setExitCode(0);
      } else {
        deps.write(`Build failed: ${result.error ?? 'unknown error'}\n`);
        deps.setExitCode(EXIT_FAILED);
      }
    }));

  image
    .command('inspect')
    .description('Show what the built image runs')
    .option('--tag <tag>', 'Image tag (default: IMAGE_TAG)')
    .action(action<ImageOptions>(async (options) => {
      const config = deps.loadConfig();
      const builder = createImageBuilder(config, { executor: deps.executor });
      const inspection = await builder.inspect(config.image.name, options.tag ?? config.image.tag);

      deps.write(`${inspection.reference}\n`);
      deps.write(`  entrypoint: ${JSON.stringify(inspection.entrypoint)}\n`);
      deps.write(`  cmd: ${JSON.stringify(inspection.cmd)}\n`);
      deps.write(`  runs artifact: ${inspection.runsArtifact ? 'yes' : 'no'}\n`);
      deps.setExitCode(inspection.runsArtifact ? 0 : EXIT_FAILED);
    }));

  image
    .command('push')
    .description('Push the image to DOCKER_REGISTRY')
    .option('--tag <tag>', 'Image tag (default: IMAGE_TAG)')
    .action(action<ImageOptions>(async (options) => {
      const config = deps.loadConfig();
      const builder = createImageBuilder(config, { executor: deps.executor });
      if (!config.image.registry) {
        throw new ConfigurationError('DOCKER_REGISTRY is not set');
      }
      const result = await builder.push(config.image.name, options.tag ?? config.image.tag);

      if (result.success) {
        deps.write(`Pushed ${result.reference}\n`);
        deps.setExitCode(0);
      } else {
        deps.write(`Push failed: ${result.error ?? 'unknown error'}\n`);
        deps.setExitCode(EXIT_FAILED);
      }
    }));

  return program;
}
