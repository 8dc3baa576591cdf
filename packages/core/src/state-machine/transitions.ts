/**
 * Promotion state transition definitions and validation
 */

import { PROMOTION_STATES, type PromotionState } from '@deckhand/shared';
import { InvalidTransitionError } from '@deckhand/shared';

export interface StateTransition {
  from: PromotionState;
  to: PromotionState;
  condition?: string;
}

// Valid state transitions
// Every state before cleanup can fail; cleanup follows both success and failure
const VALID_TRANSITIONS: StateTransition[] = [
  // From IDLE
  { from: PROMOTION_STATES.IDLE, to: PROMOTION_STATES.CREDENTIALS_INSTALLED, condition: 'bundle_written' },
  { from: PROMOTION_STATES.IDLE, to: PROMOTION_STATES.FAILED, condition: 'bundle_failed' },

  // From CREDENTIALS_INSTALLED
  { from: PROMOTION_STATES.CREDENTIALS_INSTALLED, to: PROMOTION_STATES.REMOTE_SYNCED, condition: 'checkout_and_pull_succeeded' },
  { from: PROMOTION_STATES.CREDENTIALS_INSTALLED, to: PROMOTION_STATES.SERVICE_RESTARTED, condition: 'chained_command_succeeded' },
  { from: PROMOTION_STATES.CREDENTIALS_INSTALLED, to: PROMOTION_STATES.FAILED, condition: 'sync_failed' },

  // From REMOTE_SYNCED
  { from: PROMOTION_STATES.REMOTE_SYNCED, to: PROMOTION_STATES.REMOTE_REBUILT, condition: 'build_succeeded' },
  { from: PROMOTION_STATES.REMOTE_SYNCED, to: PROMOTION_STATES.FAILED, condition: 'build_failed' },

  // From REMOTE_REBUILT
  { from: PROMOTION_STATES.REMOTE_REBUILT, to: PROMOTION_STATES.SERVICE_RESTARTED, condition: 'restart_succeeded' },
  { from: PROMOTION_STATES.REMOTE_REBUILT, to: PROMOTION_STATES.FAILED, condition: 'restart_failed' },

  // From SERVICE_RESTARTED
  { from: PROMOTION_STATES.SERVICE_RESTARTED, to: PROMOTION_STATES.FAILED, condition: 'cleanup_failed' },

  // Cleanup
  { from: PROMOTION_STATES.SERVICE_RESTARTED, to: PROMOTION_STATES.CREDENTIALS_CLEANED, condition: 'bundle_removed' },
  { from: PROMOTION_STATES.FAILED, to: PROMOTION_STATES.CREDENTIALS_CLEANED, condition: 'bundle_removed' },

  // CREDENTIALS_CLEANED is terminal
];

export class TransitionValidator {
  private transitionMap: Map<PromotionState, StateTransition[]>;

  constructor() {
    this.transitionMap = new Map();

    for (const transition of VALID_TRANSITIONS) {
      const existing = this.transitionMap.get(transition.from) ?? [];
      existing.push(transition);
      this.transitionMap.set(transition.from, existing);
    }
  }

  /**
   * Check if a transition is valid
   */
  isValidTransition(from: PromotionState, to: PromotionState): boolean {
    const transitions = this.transitionMap.get(from) ?? [];
    return transitions.some((t) => t.to === to);
  }

  /**
   * Get all valid transitions from a state
   */
  getValidTransitions(from: PromotionState): PromotionState[] {
    const transitions = this.transitionMap.get(from) ?? [];
    return transitions.map((t) => t.to);
  }

  /**
   * Validate and throw if invalid
   */
  validateTransition(from: PromotionState, to: PromotionState): void {
    if (!this.isValidTransition(from, to)) {
      throw new InvalidTransitionError(from, to, {
        validTransitions: this.getValidTransitions(from),
      });
    }
  }

  /**
   * Check if a state is terminal
   */
  isTerminalState(state: PromotionState): boolean {
    return state === PROMOTION_STATES.CREDENTIALS_CLEANED;
  }
}

// Singleton instance
export const transitionValidator = new TransitionValidator();
