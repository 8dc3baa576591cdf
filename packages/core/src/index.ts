/**
 * @deckhand/core
 * Image build, verification, promotion and the pipeline that ties them together
 */

// Container image
export * from './build/index.js';

// Verification stages
export * from './verification/index.js';

// Promotion state machine
export * from './state-machine/index.js';

// Promotion lock
export * from './lock/index.js';

// Promotion stage
export * from './promotion/index.js';

// Pipeline orchestrator
export * from './orchestrator/index.js';

// Wiring
export * from './factory.js';
