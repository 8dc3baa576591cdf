/**
 * @deckhand/shared
 * Shared types, utilities, and configuration for Deckhand
 */

export * from './types/index.js';
export * from './config/index.js';
export * from './logger/index.js';
export * from './errors/index.js';
export * from './process/index.js';
export * from './process/termination.js';
