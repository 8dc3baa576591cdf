/**
 * Types for the container image build
 */

import type { CommandExecutor, DockerfileFinding, ImageRecipe, Logger } from '@deckhand/shared';

/**
 * Image builder configuration
 */
export interface ImageBuilderConfig {
  /** Docker registry prefix, empty for the local daemon only */
  registry: string;
  recipe: ImageRecipe;
  /** Build timeout in ms */
  buildTimeout: number;
  /** Replace an existing Dockerfile in the build context */
  overwriteDockerfile: boolean;
  /** Build arguments */
  buildArgs?: Record<string, string>;
  /** Labels to add to image */
  labels?: Record<string, string>;
}

export const DEFAULT_IMAGE_RECIPE: ImageRecipe = {
  builderImage: 'rust:bookworm',
  builderStageName: 'builder',
  compileCommand: 'cargo build --release',
  runtimeImage: 'debian:bookworm-slim',
  runtimePackages: ['libssl-dev', 'ca-certificates'],
  artifact: {
    binaryName: 'jab3',
    path: '/target/release/jab3',
  },
};

export const DEFAULT_IMAGE_BUILDER_CONFIG: ImageBuilderConfig = {
  registry: '',
  recipe: DEFAULT_IMAGE_RECIPE,
  buildTimeout: 1800000, // 30 minutes
  overwriteDockerfile: false,
};

export interface ImageBuilderDeps {
  executor?: CommandExecutor;
  logger?: Logger;
}

/**
 * Image build result
 */
export interface ImageBuildResult {
  success: boolean;
  imageName?: string;
  imageTag?: string;
  imageId?: string;
  error?: string;
  findings: DockerfileFinding[];
  buildLogs: string[];
  durationMs: number;
}

export interface ImagePushResult {
  success: boolean;
  reference: string;
  error?: string;
}

/**
 * What `docker image inspect` reports about how the image starts
 */
export interface ImageInspection {
  reference: string;
  entrypoint: string[];
  cmd: string[];
  /** The first word the container runs is the artifact path */
  runsArtifact: boolean;
}
