export { PromotionLock, lockKeyFor } from './promotion-lock.js';
export type { HeldLock, PromotionLockOptions } from './promotion-lock.js';
export { FileLockStore, MemoryLockStore } from './lock-store.js';
export type { LockRecord, LockStore } from './lock-store.js';
