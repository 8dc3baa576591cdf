/**
 * Container image exports
 */

export { ImageBuilder } from './image-builder.js';
export * from './dockerfile.js';
export * from './types.js';
