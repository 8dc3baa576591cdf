/**
 * Core types for Deckhand
 */

export * from './pipeline.js';
export * from './promotion.js';
export * from './image.js';
