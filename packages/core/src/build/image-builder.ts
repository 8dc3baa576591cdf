/**
 * Image Builder
 * Builds the two-stage runtime image: a compile stage that produces the binary,
 * a slim runtime stage that carries only that binary and its system libraries.
 */

import { z } from 'zod';
import { readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  ImageBuildError,
  createChildLogger,
  runCommand,
  tailLines,
  type CommandExecutor,
  type DockerfileAnalysis,
  type Logger,
} from '@deckhand/shared';
import { analyzeDockerfile, renderDockerfile } from './dockerfile.js';
import type {
  ImageBuilderConfig,
  ImageBuilderDeps,
  ImageBuildResult,
  ImageInspection,
  ImagePushResult,
} from './types.js';
import { DEFAULT_IMAGE_BUILDER_CONFIG } from './types.js';

const inspectConfigSchema = z.object({
  Entrypoint: z.array(z.string()).nullable().optional(),
  Cmd: z.array(z.string()).nullable().optional(),
});

export class ImageBuilder {
  private config: ImageBuilderConfig;
  private executor: CommandExecutor;
  private logger: Logger;

  constructor(config: Partial<ImageBuilderConfig> = {}, deps: ImageBuilderDeps = {}) {
    this.config = { ...DEFAULT_IMAGE_BUILDER_CONFIG, ...config };
    this.executor = deps.executor ?? runCommand;
    this.logger = deps.logger ?? createChildLogger({ component: 'ImageBuilder' });
  }

  /**
   * Full image reference, registry included when configured
   */
  reference(imageName: string, tag: string = 'latest'): string {
    return this.config.registry
      ? `${this.config.registry}/${imageName}:${tag}`
      : `${imageName}:${tag}`;
  }

  /**
   * The Dockerfile this builder generates
   */
  dockerfile(): string {
    return renderDockerfile(this.config.recipe);
  }

  /**
   * Check a Dockerfile against the non-leakage rules
   */
  analyze(content: string): DockerfileAnalysis {
    return analyzeDockerfile(content, { artifactPath: this.config.recipe.artifact.path });
  }

  /**
   * Build the image from a source tree. A compile failure aborts the build and no tag is produced.
   */
  async build(
    contextDir: string,
    imageName: string,
    tag: string = 'latest'
  ): Promise<ImageBuildResult> {
    const startTime = Date.now();
    const fullImageName = this.reference(imageName, tag);
    const buildLogs: string[] = [];

    this.logger.info({
      contextDir,
      imageName: fullImageName,
    }, 'Building Docker image');

    try {
      const dockerfilePath = await this.ensureDockerfile(contextDir);
      const analysis = this.analyze(await readFile(dockerfilePath, 'utf-8'));

      if (!analysis.ok) {
        const errors = analysis.findings.filter((finding) => finding.severity === 'error');
        this.logger.error({ findings: errors }, 'Dockerfile failed non-leakage checks');
        return {
          success: false,
          error: `Dockerfile rejected: ${errors.map((finding) => finding.rule).join(', ')}`,
          findings: analysis.findings,
          buildLogs,
          durationMs: Date.now() - startTime,
        };
      }

      const args = ['build', '-t', fullImageName, '-f', dockerfilePath];

      if (this.config.buildArgs) {
        for (const [key, value] of Object.entries(this.config.buildArgs)) {
          args.push('--build-arg', `${key}=${value}`);
        }
      }

      if (this.config.labels) {
        for (const [key, value] of Object.entries(this.config.labels)) {
          args.push('--label', `${key}=${value}`);
        }
      }

      args.push('.');

      this.logger.debug({ args }, 'Running docker build');

      const result = await this.executor({
        command: 'docker',
        args,
        cwd: contextDir,
        timeoutMs: this.config.buildTimeout,
        onOutput: (chunk) => buildLogs.push(chunk),
      });

      if (result.exitCode !== 0) {
        const error = result.timedOut
          ? `Build timed out after ${this.config.buildTimeout}ms`
          : result.error ?? (tailLines(result.stderr, 20) || `Build failed with exit code ${result.exitCode ?? 'none'}`);
        this.logger.error({ error }, 'Docker build failed');

        return {
          success: false,
          error,
          findings: analysis.findings,
          buildLogs,
          durationMs: Date.now() - startTime,
        };
      }

      // BuildKit reports on stderr, the classic builder on stdout
      const output = `${result.stdout}\n${result.stderr}`;
      const idMatch = output.match(/writing image sha256:([a-f0-9]+)/i) ??
                     output.match(/sha256:([a-f0-9]{12,})/);
      const imageId = idMatch?.[1]?.slice(0, 12);

      this.logger.info({
        imageName: fullImageName,
        imageId,
      }, 'Docker image built successfully');

      return {
        success: true,
        imageName,
        imageTag: tag,
        imageId,
        findings: analysis.findings,
        buildLogs,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error({ error: errorMessage }, 'Image build failed');

      return {
        success: false,
        error: errorMessage,
        findings: [],
        buildLogs,
        durationMs: Date.now() - startTime,
      };
    }
  }

  /**
   * Push image to registry
   */
  async push(imageName: string, tag: string = 'latest'): Promise<ImagePushResult> {
    const reference = this.reference(imageName, tag);

    if (!this.config.registry) {
      return { success: false, reference, error: 'No registry configured' };
    }

    this.logger.info({ imageName: reference }, 'Pushing Docker image');

    const result = await this.executor({ command: 'docker', args: ['push', reference] });

    if (result.exitCode === 0) {
      this.logger.info({ imageName: reference }, 'Image pushed successfully');
      return { success: true, reference };
    }

    const error = result.error ?? (result.stderr || `Push failed with exit code ${result.exitCode ?? 'none'}`);
    this.logger.error({ error }, 'Image push failed');
    return { success: false, reference, error };
  }

  /**
   * Read the start command of a built image
   */
  async inspect(imageName: string, tag: string = 'latest'): Promise<ImageInspection> {
    const reference = this.reference(imageName, tag);
    const result = await this.executor({
      command: 'docker',
      args: ['image', 'inspect', '--format', '{{json .Config}}', reference],
    });

    if (result.exitCode !== 0) {
      throw new ImageBuildError(
        result.error ?? (result.stderr.trim() || `docker image inspect failed for ${reference}`),
        { reference }
      );
    }

    const parsed = inspectConfigSchema.parse(JSON.parse(result.stdout));
    const entrypoint = parsed.Entrypoint ?? [];
    const cmd = parsed.Cmd ?? [];
    const firstWord = entrypoint[0] ?? cmd[0];

    return {
      reference,
      entrypoint,
      cmd,
      runsArtifact: firstWord === this.config.recipe.artifact.path,
    };
  }

  /**
   * Write the generated Dockerfile unless the context already has one we should keep
   */
  private async ensureDockerfile(contextDir: string): Promise<string> {
    const dockerfilePath = join(contextDir, 'Dockerfile');

    let exists = false;
    try {
      await stat(dockerfilePath);
      exists = true;
    } catch {
      exists = false;
    }

    if (!exists || this.config.overwriteDockerfile) {
      await writeFile(dockerfilePath, this.dockerfile(), 'utf-8');
      this.logger.debug({ dockerfilePath }, 'Generated Dockerfile');
    }

    return dockerfilePath;
  }
}
