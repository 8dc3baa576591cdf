/**
 * Promotion exports
 */

export { PromotionStage } from './promotion-stage.js';
export { DEFAULT_PROMOTION_STAGE_CONFIG } from './types.js';
export type {
  PromotionStageConfig,
  PromotionStageDeps,
  PromotionStageEvents,
  RemoteSession,
  RemoteSessionFactory,
} from './types.js';
