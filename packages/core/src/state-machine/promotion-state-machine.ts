/**
 * Promotion State Machine Implementation
 * Records the path one promotion takes so the result can report what the remote side was left with.
 */

import { EventEmitter } from 'eventemitter3';
import {
  PROMOTION_STATES,
  createChildLogger,
  logPromotionTransition,
  type PromotionState,
  type PromotionTransition,
} from '@deckhand/shared';
import { transitionValidator } from './transitions.js';
import type { PromotionStateMachineConfig, PromotionStateMachineEvents } from './types.js';

export class PromotionStateMachine extends EventEmitter<PromotionStateMachineEvents> {
  private currentState: PromotionState = PROMOTION_STATES.IDLE;
  private transitions: PromotionTransition[] = [];
  private failureReason: string | undefined;
  private config: PromotionStateMachineConfig;
  private logger = createChildLogger({ component: 'PromotionStateMachine' });

  constructor(config: PromotionStateMachineConfig) {
    super();
    this.config = config;
  }

  /**
   * Get current state
   */
  getState(): PromotionState {
    return this.currentState;
  }

  /**
   * Transitions taken so far, oldest first
   */
  getTransitions(): PromotionTransition[] {
    return [...this.transitions];
  }

  getFailureReason(): string | undefined {
    return this.failureReason;
  }

  /**
   * Check if a promotion is in flight (not idle, not cleaned up)
   */
  isActive(): boolean {
    return (
      this.currentState !== PROMOTION_STATES.IDLE &&
      !transitionValidator.isTerminalState(this.currentState)
    );
  }

  /**
   * The last state reached before FAILED, or the current state
   */
  lastProgressState(): PromotionState {
    for (let i = this.transitions.length - 1; i >= 0; i--) {
      const transition = this.transitions[i];
      if (transition && transition.to === PROMOTION_STATES.FAILED) {
        return transition.from;
      }
    }
    return this.currentState;
  }

  /**
   * Transition to a new state
   */
  transition(toState: PromotionState): void {
    const fromState = this.currentState;

    transitionValidator.validateTransition(fromState, toState);

    const record: PromotionTransition = { from: fromState, to: toState, at: new Date() };
    this.currentState = toState;
    this.transitions.push(record);

    logPromotionTransition(this.config.runId, fromState, toState, this.config.target);

    this.emit('state:changed', record);
  }

  /**
   * Move to FAILED, keeping the first reason given
   */
  fail(reason: string): void {
    const fromState = this.currentState;
    this.failureReason ??= reason;
    this.transition(PROMOTION_STATES.FAILED);
    this.logger.warn({ runId: this.config.runId, from: fromState, reason }, 'Promotion failed');
    this.emit('state:failed', { from: fromState, reason });
  }

  /**
   * Reset state machine
   */
  reset(): void {
    this.currentState = PROMOTION_STATES.IDLE;
    this.transitions = [];
    this.failureReason = undefined;
  }
}
