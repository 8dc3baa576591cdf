/**
 * Promotion gate
 * Promotion happens only when every required stage passed and the trigger is eligible.
 */

import {
  ALL_VERIFICATION_STAGES,
  type PromotionGate,
  type StageResult,
  type TriggerKind,
  type VerificationStage,
} from '@deckhand/shared';

export interface GateInput {
  results: readonly StageResult[];
  trigger: TriggerKind;
  promoteOn: readonly TriggerKind[];
  /** False for check-only runs */
  promoteEnabled: boolean;
  requiredStages?: readonly VerificationStage[];
}

export function decideGate(input: GateInput): PromotionGate {
  const required = input.requiredStages ?? ALL_VERIFICATION_STAGES;

  // A required stage with no result has not passed
  const failedStages = required.filter(
    (stage) => !input.results.some((result) => result.stage === stage && result.status === 'passed')
  );

  if (failedStages.length > 0) {
    return { promote: false, reason: 'verification_failed', failedStages };
  }
  if (!input.promoteEnabled) {
    return { promote: false, reason: 'promotion_disabled', failedStages };
  }
  if (!input.promoteOn.includes(input.trigger)) {
    return { promote: false, reason: 'trigger_not_eligible', failedStages };
  }
  return { promote: true, reason: 'approved', failedStages };
}
