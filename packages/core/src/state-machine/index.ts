/**
 * Promotion State Machine
 *
 * States: IDLE → CREDENTIALS_INSTALLED → REMOTE_SYNCED → REMOTE_REBUILT → SERVICE_RESTARTED → CREDENTIALS_CLEANED
 * Any state before cleanup may go to FAILED, which still ends in CREDENTIALS_CLEANED.
 */

export { PromotionStateMachine } from './promotion-state-machine.js';
export { TransitionValidator, transitionValidator } from './transitions.js';
export type { StateTransition } from './transitions.js';
export type { PromotionStateMachineConfig, PromotionStateMachineEvents } from './types.js';
