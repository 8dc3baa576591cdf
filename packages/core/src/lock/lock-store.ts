/**
 * Lock stores
 * A lock is one record per key; creating it fails while another holder's record exists.
 */

import { randomUUID } from 'node:crypto';
import { readFileSync, unlinkSync } from 'node:fs';
import { link, mkdir, readFile, rename, rm, stat, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';

export interface LockRecord {
  key: string;
  holder: string;
  acquiredAt: Date;
  expiresAt: Date;
}

export interface LockStore {
  /**
   * Get the record for a key
   */
  find(key: string): Promise<LockRecord | null>;
  /**
   * Create the record. Returns false when a record for the key already exists.
   */
  create(record: LockRecord): Promise<boolean>;
  /**
   * Move the expiry of a record `holder` owns. Returns false when it no longer holds it.
   */
  extend(key: string, holder: string, expiresAt: Date): Promise<boolean>;
  /**
   * Remove the record if `holder` owns it. Returns whether a record was removed.
   */
  remove(key: string, holder: string): Promise<boolean>;
  /**
   * Synchronous `remove`, for exit and signal handlers
   */
  removeSync(key: string, holder: string): boolean;
}

export interface FileLockStoreOptions {
  /**
   * How long a lock file that cannot be parsed counts as held, from its mtime, in ms
   */
  unreadableTtlMs?: number;
}

const lockFileSchema = z.object({
  key: z.string(),
  holder: z.string(),
  acquiredAt: z.coerce.date(),
  expiresAt: z.coerce.date(),
});

function parseJson(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    return null;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function isMissing(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}

function serialize(record: LockRecord): string {
  return JSON.stringify({
    key: record.key,
    holder: record.holder,
    acquiredAt: record.acquiredAt.toISOString(),
    expiresAt: record.expiresAt.toISOString(),
  });
}

/**
 * One file per key. Records are written to a temporary file first and then
 * linked into place, so a lock file is never seen half-written and only one
 * process can create it.
 */
export class FileLockStore implements LockStore {
  private readonly unreadableTtlMs: number;

  constructor(private readonly dir: string, options: FileLockStoreOptions = {}) {
    this.unreadableTtlMs = options.unreadableTtlMs ?? 1800000;
  }

  pathFor(key: string): string {
    return join(this.dir, `${key.replace(/[^A-Za-z0-9_.-]/g, '_')}.lock`);
  }

  async find(key: string): Promise<LockRecord | null> {
    const path = this.pathFor(key);
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }

    const parsed = lockFileSchema.safeParse(parseJson(content));
    if (parsed.success) {
      return parsed.data;
    }

    // Held by an unknown owner until it has gone unmodified for the TTL
    let modifiedAt: Date;
    try {
      modifiedAt = (await stat(path)).mtime;
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }
    return {
      key,
      holder: 'unknown',
      acquiredAt: modifiedAt,
      expiresAt: new Date(modifiedAt.getTime() + this.unreadableTtlMs),
    };
  }

  async create(record: LockRecord): Promise<boolean> {
    await mkdir(this.dir, { recursive: true });
    const path = this.pathFor(record.key);
    const tempPath = `${path}.${randomUUID()}.tmp`;

    await writeFile(tempPath, serialize(record), { mode: 0o644 });
    try {
      await link(tempPath, path);
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') return false;
      throw error;
    } finally {
      await rm(tempPath, { force: true });
    }
  }

  async extend(key: string, holder: string, expiresAt: Date): Promise<boolean> {
    const existing = await this.find(key);
    if (!existing || existing.holder !== holder) return false;

    const path = this.pathFor(key);
    const tempPath = `${path}.${randomUUID()}.tmp`;
    await writeFile(tempPath, serialize({ ...existing, expiresAt }), { mode: 0o644 });
    try {
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
    return true;
  }

  async remove(key: string, holder: string): Promise<boolean> {
    const existing = await this.find(key);
    if (!existing || existing.holder !== holder) return false;

    try {
      await unlink(this.pathFor(key));
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  removeSync(key: string, holder: string): boolean {
    const path = this.pathFor(key);
    try {
      const parsed = lockFileSchema.safeParse(parseJson(readFileSync(path, 'utf-8')));
      if (!parsed.success || parsed.data.holder !== holder) return false;
      unlinkSync(path);
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }
}

/**
 * In-process store, for a single orchestrator and for tests
 */
export class MemoryLockStore implements LockStore {
  private records = new Map<string, LockRecord>();

  async find(key: string): Promise<LockRecord | null> {
    return this.records.get(key) ?? null;
  }

  async create(record: LockRecord): Promise<boolean> {
    if (this.records.has(record.key)) return false;
    this.records.set(record.key, { ...record });
    return true;
  }

  async extend(key: string, holder: string, expiresAt: Date): Promise<boolean> {
    const existing = this.records.get(key);
    if (!existing || existing.holder !== holder) return false;
    this.records.set(key, { ...existing, expiresAt });
    return true;
  }

  async remove(key: string, holder: string): Promise<boolean> {
    return this.removeSync(key, holder);
  }

  removeSync(key: string, holder: string): boolean {
    const existing = this.records.get(key);
    if (!existing || existing.holder !== holder) return false;
    this.records.delete(key);
    return true;
  }
}
