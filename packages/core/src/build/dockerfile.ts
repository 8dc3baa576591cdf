/**
 * Dockerfile rendering and analysis
 * The runtime stage may only carry the compiled artifact and its system packages:
 * no build context, no toolchain base.
 */

import type {
  DockerfileAnalysis,
  DockerfileFinding,
  DockerfileInstruction,
  DockerfileStage,
  ImageRecipe,
} from '@deckhand/shared';

/**
 * Render the two-stage Dockerfile for a recipe
 */
export function renderDockerfile(recipe: ImageRecipe): string {
  const { artifact } = recipe;
  const lines = [
    '# syntax=docker/dockerfile:1',
    `FROM ${recipe.builderImage} AS ${recipe.builderStageName}`,
    'COPY . .',
    `RUN ${recipe.compileCommand}`,
    '',
    `FROM ${recipe.runtimeImage}`,
  ];

  if (recipe.runtimePackages.length > 0) {
    lines.push(
      `RUN apt-get update && apt-get install -y --no-install-recommends ${recipe.runtimePackages.join(' ')} && rm -rf /var/lib/apt/lists/*`
    );
  }

  lines.push(
    `COPY --from=${recipe.builderStageName} ${artifact.path} ${artifact.path}`,
    `CMD ${JSON.stringify([artifact.path])}`
  );

  return `${lines.join('\n')}\n`;
}

/**
 * Split a Dockerfile into instructions, joining continuation lines
 */
export function parseInstructions(content: string): DockerfileInstruction[] {
  const instructions: DockerfileInstruction[] = [];
  const lines = content.split(/\r?\n/);

  let buffer = '';
  let startLine = 0;

  lines.forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (buffer === '' && (line === '' || line.startsWith('#'))) {
      return;
    }
    // Comments inside a continued instruction are dropped
    if (buffer !== '' && line.startsWith('#')) {
      return;
    }
    if (buffer === '') {
      startLine = index + 1;
    }

    if (line.endsWith('\\')) {
      buffer += `${line.slice(0, -1).trim()} `;
      return;
    }

    buffer += line;
    const match = buffer.match(/^(\S+)\s*(.*)$/);
    if (match?.[1]) {
      instructions.push({
        keyword: match[1].toUpperCase(),
        args: (match[2] ?? '').trim(),
        line: startLine,
      });
    }
    buffer = '';
  });

  if (buffer.trim() !== '') {
    const match = buffer.trim().match(/^(\S+)\s*(.*)$/);
    if (match?.[1]) {
      instructions.push({ keyword: match[1].toUpperCase(), args: (match[2] ?? '').trim(), line: startLine });
    }
  }

  return instructions;
}

/**
 * Group instructions by FROM
 */
export function parseStages(content: string): DockerfileStage[] {
  const stages: DockerfileStage[] = [];

  for (const instruction of parseInstructions(content)) {
    if (instruction.keyword === 'FROM') {
      const words = instruction.args.split(/\s+/).filter((word) => !word.startsWith('--'));
      const asIndex = words.findIndex((word) => word.toUpperCase() === 'AS');
      stages.push({
        index: stages.length,
        baseImage: words[0] ?? '',
        name: asIndex >= 0 ? words[asIndex + 1] : undefined,
        instructions: [],
      });
      continue;
    }

    const current = stages[stages.length - 1];
    if (current) {
      current.instructions.push(instruction);
    }
  }

  return stages;
}

/**
 * Exec-form (JSON array) arguments, or null for shell form
 */
export function parseExecForm(args: string): string[] | null {
  if (!args.startsWith('[')) return null;
  try {
    const parsed: unknown = JSON.parse(args);
    if (Array.isArray(parsed) && parsed.every((part): part is string => typeof part === 'string')) {
      return parsed;
    }
    return null;
  } catch {
    return null;
  }
}

function copySource(args: string): string | undefined {
  const fromFlag = args.split(/\s+/).find((word) => word.startsWith('--from='));
  return fromFlag?.slice('--from='.length);
}

export interface AnalyzeOptions {
  /** Path the runtime stage must start */
  artifactPath?: string;
}

/**
 * Check that the final stage of a multi-stage Dockerfile leaks neither source nor toolchain
 */
export function analyzeDockerfile(content: string, options: AnalyzeOptions = {}): DockerfileAnalysis {
  const stages = parseStages(content);
  const findings: DockerfileFinding[] = [];

  const runtime = stages[stages.length - 1];
  if (!runtime) {
    findings.push({ severity: 'error', rule: 'no-stages', message: 'Dockerfile has no FROM instruction' });
    return { stages, findings, ok: false };
  }

  const earlier = stages.slice(0, -1);
  if (earlier.length === 0) {
    findings.push({
      severity: 'error',
      rule: 'single-stage',
      message: 'Runtime image is built in the same stage as the artifact, so the toolchain ships with it',
    });
  }

  const earlierRefs = new Set<string>();
  for (const stage of earlier) {
    earlierRefs.add(String(stage.index));
    if (stage.name) earlierRefs.add(stage.name);
  }

  if (earlierRefs.has(runtime.baseImage) || earlier.some((stage) => stage.baseImage === runtime.baseImage)) {
    findings.push({
      severity: 'error',
      rule: 'runtime-toolchain-base',
      message: `Runtime stage starts from ${runtime.baseImage}, which is a build stage or toolchain image`,
    });
  }

  let entrypoint: DockerfileInstruction | undefined;

  for (const instruction of runtime.instructions) {
    if (instruction.keyword === 'COPY' || instruction.keyword === 'ADD') {
      const source = copySource(instruction.args);
      if (source === undefined) {
        findings.push({
          severity: 'error',
          rule: 'runtime-copies-context',
          message: `${instruction.keyword} in the runtime stage copies from the build context`,
          line: instruction.line,
        });
      } else if (!earlierRefs.has(source)) {
        findings.push({
          severity: 'error',
          rule: 'runtime-copy-unknown-stage',
          message: `${instruction.keyword} --from=${source} does not name an earlier stage`,
          line: instruction.line,
        });
      }
    }

    if (instruction.keyword === 'CMD' || instruction.keyword === 'ENTRYPOINT') {
      // ENTRYPOINT decides what runs whenever it is present
      if (!entrypoint || instruction.keyword === 'ENTRYPOINT' || entrypoint.keyword === 'CMD') {
        entrypoint = instruction;
      }
    }
  }

  if (!entrypoint) {
    findings.push({
      severity: 'error',
      rule: 'missing-entrypoint',
      message: 'Runtime stage has no CMD or ENTRYPOINT',
    });
  } else {
    const execForm = parseExecForm(entrypoint.args);
    if (!execForm) {
      findings.push({
        severity: 'warning',
        rule: 'shell-form-entrypoint',
        message: `${entrypoint.keyword} uses shell form, so the binary does not run as PID 1`,
        line: entrypoint.line,
      });
    } else if (options.artifactPath && execForm[0] !== options.artifactPath) {
      findings.push({
        severity: 'error',
        rule: 'entrypoint-not-artifact',
        message: `${entrypoint.keyword} runs ${execForm[0] ?? '(nothing)'} instead of ${options.artifactPath}`,
        line: entrypoint.line,
      });
    }
  }

  return {
    stages,
    findings,
    ok: findings.every((finding) => finding.severity !== 'error'),
  };
}
