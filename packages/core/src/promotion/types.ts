/**
 * Promotion stage types
 */

import type {
  Logger,
  PromotionTransition,
  RemoteCommandMode,
  RemoteStepResult,
  RemoteTarget,
} from '@deckhand/shared';
import type { CredentialBundle, CredentialManager, RemoteExecResult } from '@deckhand/ssh';
import type { PromotionLock } from '../lock/index.js';

/**
 * The part of an SSH session the promotion stage drives
 */
export interface RemoteSession {
  connect(): Promise<void>;
  exec(command: string): Promise<RemoteExecResult>;
  close(): Promise<void>;
}

export type RemoteSessionFactory = (target: RemoteTarget, bundle: CredentialBundle) => RemoteSession;

export interface PromotionStageConfig {
  commandMode: RemoteCommandMode;
  connectTimeoutSec: number;
  /** Timeout for one remote step, in ms */
  commandTimeoutMs: number;
}

export const DEFAULT_PROMOTION_STAGE_CONFIG: PromotionStageConfig = {
  commandMode: 'stepwise',
  connectTimeoutSec: 30,
  commandTimeoutMs: 1800000, // 30 minutes, a release build can be slow
};

export interface PromotionStageDeps {
  credentials?: CredentialManager;
  sessionFactory?: RemoteSessionFactory;
  /** Single-flight lock; promotions are not serialised without one */
  lock?: PromotionLock;
  logger?: Logger;
}

export interface PromotionStageEvents {
  'state:changed': (transition: PromotionTransition) => void;
  'step:completed': (result: RemoteStepResult) => void;
}
