// backend/services/web/src/assets/existenceCache.ts
/**
 * TTL cache of "does this file exist?" answers for precompressed siblings.
 *
 * Concurrent checks for one path share a single in-flight lookup. A check
 * that rejects caches nothing; the default check never rejects.
 */

import fs from "node:fs/promises";

export type FileCheck = (absPath: string) => Promise<boolean>;

export const DEFAULT_EXISTENCE_TTL_MS = 5 * 60 * 1000;

export const isRegularFile: FileCheck = async (absPath) => {
  try {
    const st = await fs.stat(absPath);
    return st.isFile();
  } catch {
    return false;
  }
};

type Entry = { exists: boolean; expiresAt: number };

export class ExistenceCache {
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly check: FileCheck;
  private readonly entries = new Map<string, Entry>();
  private readonly inflight = new Map<string, Promise<boolean>>();

  constructor(opts: { ttlMs?: number; now?: () => number; check?: FileCheck } = {}) {
    this.ttlMs = opts.ttlMs ?? DEFAULT_EXISTENCE_TTL_MS;
    this.now = opts.now ?? Date.now;
    this.check = opts.check ?? isRegularFile;
  }

  get size(): number {
    return this.entries.size;
  }

  exists(absPath: string): Promise<boolean> {
    const hit = this.entries.get(absPath);
    if (hit && hit.expiresAt > this.now()) return Promise.resolve(hit.exists);

    const pending = this.inflight.get(absPath);
    if (pending) return pending;

    const lookup = this.check(absPath)
      .then((exists) => {
        if (this.ttlMs > 0) {
          this.entries.set(absPath, { exists, expiresAt: this.now() + this.ttlMs });
        }
        return exists;
      })
      .finally(() => {
        this.inflight.delete(absPath);
      });
    this.inflight.set(absPath, lookup);
    return lookup;
  }

  clear(): void {
    this.entries.clear();
  }
}
