/**
 * Container image types
 */

/**
 * The compiled binary the runtime image carries
 */
export interface BuildArtifact {
  binaryName: string;
  /** Absolute path inside both stages */
  path: string;
}

/**
 * Inputs for rendering a two-stage Dockerfile
 */
export interface ImageRecipe {
  builderImage: string;
  builderStageName: string;
  /** Command run in the compile stage */
  compileCommand: string;
  runtimeImage: string;
  /** System packages installed in the runtime stage */
  runtimePackages: string[];
  artifact: BuildArtifact;
}

export interface DockerfileInstruction {
  keyword: string;
  args: string;
  line: number;
}

export interface DockerfileStage {
  index: number;
  baseImage: string;
  name?: string;
  instructions: DockerfileInstruction[];
}

export type FindingSeverity = 'error' | 'warning';

export interface DockerfileFinding {
  severity: FindingSeverity;
  rule: string;
  message: string;
  line?: number;
}

export interface DockerfileAnalysis {
  stages: DockerfileStage[];
  findings: DockerfileFinding[];
  /** True when no finding has severity `error` */
  ok: boolean;
}
