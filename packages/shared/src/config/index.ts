/**
 * Configuration management for Deckhand
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { homedir, tmpdir } from 'node:os';
import { resolve, dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigurationError } from '../errors/index.js';
import { TRIGGER_KINDS, type TriggerKind } from '../types/pipeline.js';
import type { RemoteTarget } from '../types/promotion.js';

// npm workspaces may start us from a package directory, so look at the root as well
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../../');

const envPaths = [
  resolve(process.cwd(), '.env'),
  resolve(monorepoRoot, '.env'),
];

for (const envPath of envPaths) {
  dotenvConfig({ path: envPath });
}

// "false" must stay false, which z.coerce.boolean() does not give us
const envBoolean = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((val) => val === 'true' || val === '1' || val === 'yes');

const csv = z.string().transform((val) =>
  val
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean)
);

// Paths from the environment are not shell-expanded, so handle a leading ~ here
const localPath = z.string().transform((val) =>
  val === '~' || val.startsWith('~/') ? join(homedir(), val.slice(1)) : val
);

const words = z.string().transform((val) => val.split(/\s+/).filter(Boolean));

const triggerKind = z.enum(['pull_request', 'push', 'manual']);

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.enum(['development', 'production', 'test']).default('production'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Source tree the verification stages and the image build work on
  source: z.object({
    dir: z.string().default('.'),
  }),

  // Verification stages
  verification: z.object({
    compileCommand: z.string().default('cargo check'),
    formatCommand: z.string().default('cargo +nightly fmt --all -- --check'),
    lintCommand: z.string().default('cargo clippy --all-features'),
    testCommand: z.string().default('cargo test --workspace'),
    /** Promote lint warnings to errors */
    denyWarnings: envBoolean.default('true'),
    stageTimeoutMs: z.coerce.number().int().positive().default(1800000),
    failFast: envBoolean.default('false'),
  }),

  // Container image
  image: z.object({
    name: z.string().default('jab3'),
    tag: z.string().default('latest'),
    registry: z.string().default(''),
    builderImage: z.string().default('rust:bookworm'),
    runtimeImage: z.string().default('debian:bookworm-slim'),
    runtimePackages: csv.default('libssl-dev,ca-certificates'),
    compileCommand: z.string().default('cargo build --release'),
    binaryName: z.string().default('jab3'),
    artifactDir: z.string().default('/target/release'),
    buildTimeoutMs: z.coerce.number().int().positive().default(1800000),
  }),

  // Remote target; validated only when a promotion is about to run
  remote: z.object({
    host: z.string().optional(),
    user: z.string().optional(),
    port: z.coerce.number().int().min(1).max(65535).default(22),
    privateKey: z.string().optional(),
    workDir: z.string().optional(),
    buildCommand: z.string().optional(),
    buildArgs: words.default('build --release'),
    serviceName: z.string().optional(),
    useSudo: envBoolean.default('false'),
    commandMode: z.enum(['stepwise', 'chained']).default('stepwise'),
    connectTimeoutSec: z.coerce.number().int().positive().default(30),
    /** Per remote step */
    commandTimeoutMs: z.coerce.number().int().positive().default(1800000),
  }),

  // Local credential bundle
  credentials: z.object({
    /** Fixed directory to materialise keys in; a fresh temp directory when unset */
    dir: localPath.optional(),
    keyFileName: z.string().default('id_rsa'),
  }),

  pipeline: z.object({
    promoteOn: csv.pipe(z.array(triggerKind)).default('manual'),
  }),

  // Single-flight promotion lock
  lock: z.object({
    dir: localPath.default(join(tmpdir(), 'deckhand-locks')),
    timeoutMs: z.coerce.number().int().positive().default(1800000),
  }),
});

export type Config = z.infer<typeof configSchema>;

export type Env = Record<string, string | undefined>;

// Parse and validate configuration
export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,

    source: {
      dir: env.SOURCE_DIR,
    },

    verification: {
      compileCommand: env.CHECK_COMMAND,
      formatCommand: env.FMT_COMMAND,
      lintCommand: env.LINT_COMMAND,
      testCommand: env.TEST_COMMAND,
      denyWarnings: env.LINT_DENY_WARNINGS,
      stageTimeoutMs: env.STAGE_TIMEOUT_MS,
      failFast: env.FAIL_FAST,
    },

    image: {
      name: env.IMAGE_NAME,
      tag: env.IMAGE_TAG,
      registry: env.DOCKER_REGISTRY,
      builderImage: env.IMAGE_BUILDER_BASE,
      runtimeImage: env.IMAGE_RUNTIME_BASE,
      runtimePackages: env.IMAGE_RUNTIME_PACKAGES,
      compileCommand: env.IMAGE_COMPILE_COMMAND,
      binaryName: env.BINARY_NAME,
      artifactDir: env.ARTIFACT_DIR,
      buildTimeoutMs: env.IMAGE_BUILD_TIMEOUT_MS,
    },

    remote: {
      host: env.SSH_HOST,
      user: env.SSH_USER,
      port: env.SSH_PORT,
      privateKey: env.SSH_PRIVATE_KEY,
      workDir: env.WORK_DIR,
      buildCommand: env.CARGO,
      buildArgs: env.CARGO_BUILD_ARGS,
      serviceName: env.SERVICE_NAME,
      useSudo: env.REMOTE_USE_SUDO,
      commandMode: env.REMOTE_COMMAND_MODE,
      connectTimeoutSec: env.SSH_CONNECT_TIMEOUT,
      commandTimeoutMs: env.REMOTE_COMMAND_TIMEOUT_MS,
    },

    credentials: {
      dir: env.SSH_CREDENTIAL_DIR,
      keyFileName: env.SSH_KEY_FILE_NAME,
    },

    pipeline: {
      promoteOn: env.PROMOTE_ON,
    },

    lock: {
      dir: env.PROMOTION_LOCK_DIR,
      timeoutMs: env.PROMOTION_LOCK_TIMEOUT_MS,
    },
  };

  return configSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(env: Env = process.env): { valid: boolean; errors?: string[] } {
  try {
    loadConfig(env);
    return { valid: true };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        valid: false,
        errors: error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      };
    }
    throw error;
  }
}

// Secret names as the CI environment provides them
const REMOTE_SECRET_NAMES: Record<string, string> = {
  host: 'SSH_HOST',
  user: 'SSH_USER',
  workDir: 'WORK_DIR',
  buildCommand: 'CARGO',
  serviceName: 'SERVICE_NAME',
};

const remoteTargetSchema = z.object({
  host: z.string().min(1),
  user: z.string().min(1),
  port: z.number(),
  workDir: z.string().min(1),
  buildCommand: z.string().min(1),
  buildArgs: z.array(z.string()),
  serviceName: z.string().min(1),
  useSudo: z.boolean(),
});

/**
 * Build the frozen remote target, failing when a secret is missing
 */
export function requireRemoteTarget(config: Config): RemoteTarget {
  const parsed = remoteTargetSchema.safeParse(config.remote);
  if (!parsed.success) {
    const missing = parsed.error.errors.map((e) => {
      const field = String(e.path[0] ?? '');
      return REMOTE_SECRET_NAMES[field] ?? field;
    });
    throw new ConfigurationError(`Missing remote target settings: ${missing.join(', ')}`, {
      missing,
    });
  }

  const target = parsed.data;
  return Object.freeze({
    ...target,
    buildArgs: Object.freeze([...target.buildArgs]),
  });
}

/**
 * Private key material, with escaped newlines restored
 */
export function requirePrivateKey(config: Config): string {
  const key = config.remote.privateKey;
  if (!key || key.trim() === '') {
    throw new ConfigurationError('Missing remote target settings: SSH_PRIVATE_KEY', {
      missing: ['SSH_PRIVATE_KEY'],
    });
  }
  const restored = key.includes('\\n') && !key.includes('\n') ? key.replace(/\\n/g, '\n') : key;
  return restored.endsWith('\n') ? restored : `${restored}\n`;
}

/**
 * Map a CI event name onto a trigger kind
 */
export function parseTrigger(value: string | undefined): TriggerKind | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'workflow_dispatch' || normalized === 'dispatch') return 'manual';
  if (normalized === 'pull_request_target') return 'pull_request';
  return TRIGGER_KINDS.find((kind) => kind === normalized);
}
