/**
 * Verification exports
 */

export { VerificationRunner } from './verification-runner.js';
export * from './stages.js';
export * from './types.js';
