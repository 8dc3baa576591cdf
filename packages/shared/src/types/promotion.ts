/**
 * Promotion stage types
 */

// Promotion states, in the order a clean run visits them
export const PROMOTION_STATES = {
  IDLE: 'idle',
  CREDENTIALS_INSTALLED: 'credentials_installed',
  REMOTE_SYNCED: 'remote_synced',
  REMOTE_REBUILT: 'remote_rebuilt',
  SERVICE_RESTARTED: 'service_restarted',
  FAILED: 'failed',
  CREDENTIALS_CLEANED: 'credentials_cleaned',
} as const;

export type PromotionState = (typeof PROMOTION_STATES)[keyof typeof PROMOTION_STATES];

/**
 * Individual remote calls. `chained` is the single call of the legacy command mode.
 */
export type RemoteStep = 'checkout' | 'pull' | 'build' | 'restart' | 'chained';

export const REMOTE_STEP_ORDER: readonly RemoteStep[] = ['checkout', 'pull', 'build', 'restart'];

/**
 * What a partially applied promotion left on the remote side
 */
export type RemoteOutcome = 'unchanged' | 'checked_out' | 'synced' | 'rebuilt' | 'restarted' | 'unknown';

export type RemoteCommandMode = 'stepwise' | 'chained';

/**
 * Where promotion applies. Frozen once built from configuration.
 */
export interface RemoteTarget {
  readonly host: string;
  readonly user: string;
  readonly port: number;
  readonly workDir: string;
  /** Build tool on the remote machine (the CARGO secret) */
  readonly buildCommand: string;
  readonly buildArgs: readonly string[];
  /** systemd unit name */
  readonly serviceName: string;
  readonly useSudo: boolean;
}

export interface RemoteStepResult {
  step: RemoteStep;
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export interface PromotionTransition {
  from: PromotionState;
  to: PromotionState;
  at: Date;
}

export interface PromotionResult {
  success: boolean;
  refName: string;
  target: string;
  steps: RemoteStepResult[];
  failedStep?: RemoteStep | 'credentials' | 'connect';
  remoteOutcome: RemoteOutcome;
  transitions: PromotionTransition[];
  credentialsRemoved: boolean;
  error?: string;
  durationMs: number;
}
