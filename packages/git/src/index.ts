/**
 * @deckhand/git
 * Revision lookup for pipeline runs
 */

export * from './types.js';
export * from './client/index.js';
