/**
 * Promotion Lock
 * Single-flight promotion per remote target, keyed by `user@host:workDir`.
 * A held lock is kept alive by a heartbeat; locks whose expiry has passed are
 * treated as abandoned and reclaimed.
 */

import { randomUUID } from 'node:crypto';
import { hostname } from 'node:os';
import {
  PromotionLockedError,
  createLogger,
  onTermination,
  type Logger,
  type RemoteTarget,
} from '@deckhand/shared';
import type { LockRecord, LockStore } from './lock-store.js';
import { MemoryLockStore } from './lock-store.js';

export interface PromotionLockOptions {
  store?: LockStore;
  /** Time without a heartbeat after which a held lock is reclaimed, in ms */
  timeoutMs?: number;
  /** Heartbeat interval, in ms. Defaults to a third of the timeout. */
  heartbeatIntervalMs?: number;
  logger?: Logger;
}

export interface HeldLock {
  record: LockRecord;
  release: () => Promise<boolean>;
}

export function lockKeyFor(target: RemoteTarget): string {
  return `${target.user}@${target.host}:${target.workDir}`;
}

export class PromotionLock {
  private readonly store: LockStore;
  private readonly timeoutMs: number;
  private readonly heartbeatIntervalMs: number;
  private readonly logger: Logger;

  constructor(options: PromotionLockOptions = {}) {
    this.store = options.store ?? new MemoryLockStore();
    this.timeoutMs = options.timeoutMs ?? 1800000;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? Math.max(1, Math.floor(this.timeoutMs / 3));
    this.logger = options.logger ?? createLogger('PromotionLock');
  }

  /**
   * Acquire the lock for a target or throw PromotionLockedError.
   * Until `release`, the lock is extended on every heartbeat and removed if the
   * process terminates.
   */
  async acquire(target: RemoteTarget): Promise<HeldLock> {
    const key = lockKeyFor(target);
    const now = new Date();

    const existing = await this.store.find(key);
    if (existing && existing.expiresAt.getTime() <= now.getTime()) {
      await this.store.remove(key, existing.holder);
      this.logger.warn(
        { key, holder: existing.holder, acquiredAt: existing.acquiredAt },
        'Reclaimed stale promotion lock'
      );
    }

    const record: LockRecord = {
      key,
      holder: `${hostname()}:${process.pid}:${randomUUID()}`,
      acquiredAt: now,
      expiresAt: new Date(now.getTime() + this.timeoutMs),
    };

    if (!(await this.store.create(record))) {
      const holder = await this.store.find(key);
      this.logger.info({ key, lockedBy: holder?.holder }, 'Promotion lock already held');
      throw new PromotionLockedError(key, holder?.acquiredAt ?? now);
    }

    this.logger.info({ key, expiresAt: record.expiresAt }, 'Promotion lock acquired');

    const releaseGuard = onTermination(() => {
      this.store.removeSync(record.key, record.holder);
    });

    let pendingHeartbeat: Promise<boolean> = Promise.resolve(true);
    const interval = setInterval(() => {
      pendingHeartbeat = this.heartbeat(record).then((extended) => {
        if (!extended) clearInterval(interval);
        return extended;
      });
    }, this.heartbeatIntervalMs);
    interval.unref();

    return {
      record,
      release: async () => {
        clearInterval(interval);
        releaseGuard();
        // An extend still in flight must not rewrite the record after removal
        await pendingHeartbeat;
        return this.release(record);
      },
    };
  }

  /**
   * Push the expiry of a held lock forward by the timeout. Resolves false,
   * never rejects, when the lock could not be extended.
   */
  async heartbeat(record: LockRecord): Promise<boolean> {
    const expiresAt = new Date(Date.now() + this.timeoutMs);
    try {
      if (await this.store.extend(record.key, record.holder, expiresAt)) {
        record.expiresAt = expiresAt;
        this.logger.debug({ key: record.key, expiresAt }, 'Promotion lock extended');
        return true;
      }
      this.logger.warn({ key: record.key }, 'Promotion lock lost, stopping heartbeat');
    } catch (error) {
      this.logger.warn(
        { key: record.key, error: error instanceof Error ? error.message : String(error) },
        'Promotion lock heartbeat failed, stopping'
      );
    }
    return false;
  }

  /**
   * Release a lock this process holds
   */
  async release(record: LockRecord): Promise<boolean> {
    const released = await this.store.remove(record.key, record.holder);
    if (released) {
      this.logger.info({ key: record.key }, 'Promotion lock released');
    } else {
      this.logger.warn({ key: record.key }, 'Promotion lock was no longer held');
    }
    return released;
  }
}
