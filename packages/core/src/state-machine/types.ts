/**
 * State machine types
 */

import type { PromotionState, PromotionTransition } from '@deckhand/shared';

export interface PromotionStateMachineConfig {
  /** Correlates log lines with the pipeline run */
  runId: string;
  /** `user@host` of the remote target */
  target: string;
}

export interface PromotionStateMachineEvents {
  'state:changed': (transition: PromotionTransition) => void;
  'state:failed': (event: { from: PromotionState; reason: string }) => void;
}
