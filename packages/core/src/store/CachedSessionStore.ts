import { LRUCache } from "lru-cache";
import type { Logger } from "../errors";
import type { SessionStore } from "./SessionStore";
import { secondsToMs } from "../utils/time";

/**
 * Secondary cache kept in front of a primary {@link SessionStore}.
 */
export interface SessionCache {
  /**
   * Set when every process reads and writes this same cache, so deletes made
   * elsewhere already evict the entry.
   */
  readonly shared?: boolean;
  get(sessionId: string): Promise<string | undefined>;
  set(sessionId: string, raw: string, ttlMs: number): Promise<void>;
  delete(sessionId: string): Promise<void>;
}

export type LruSessionCacheOptions = {
  maxEntries?: number; // default 10_000
};

/**
 * In-process cache backed by `lru-cache`.
 */
export class LruSessionCache implements SessionCache {
  private readonly cache: LRUCache<string, string>;

  constructor(options?: LruSessionCacheOptions) {
    this.cache = new LRUCache<string, string>({
      max: options?.maxEntries ?? 10_000,
      ttlAutopurge: false,
    });
  }

  async get(sessionId: string): Promise<string | undefined> {
    return this.cache.get(sessionId);
  }

  async set(sessionId: string, raw: string, ttlMs: number): Promise<void> {
    this.cache.set(sessionId, raw, { ttl: ttlMs });
  }

  async delete(sessionId: string): Promise<void> {
    this.cache.delete(sessionId);
  }
}

export type CachedSessionStoreOptions = {
  cache?: SessionCache;
  ttlSeconds?: number; // default 60
  logger?: Logger;
};

/**
 * Read-through cache over a primary store.
 *
 * Reads try the cache first and fill it from the primary on a miss. Writes and
 * deletes hit the primary first. No entry outlives the record it copies: writes
 * are capped by the record TTL, read-miss fills by the lifetime the primary
 * reports through `ttlMs`, and primaries without `ttlMs` get no read-miss fills.
 *
 * Hits on a cache that is not {@link SessionCache.shared} are confirmed with
 * the primary's `ttlMs` first, so a record deleted or expired in another
 * process is never served. A rewrite made in another process may still be read
 * from this cache for up to `ttlSeconds`.
 *
 * Cache failures are logged and fall through to the primary.
 */
export class CachedSessionStore implements SessionStore {
  private readonly cache: SessionCache;
  private readonly cacheTtlMs: number;

  constructor(
    private readonly primary: SessionStore,
    private readonly options?: CachedSessionStoreOptions,
  ) {
    this.cache = options?.cache ?? new LruSessionCache();
    this.cacheTtlMs = secondsToMs(options?.ttlSeconds ?? 60);
  }

  async load(sessionId: string): Promise<string | null> {
    const cached = await this.guard("get", sessionId, () => this.cache.get(sessionId));
    if (cached !== undefined) {
      if (this.cache.shared) {
        return cached;
      }

      const remaining = await this.remainingMs(sessionId);
      if (remaining === 0) {
        await this.guard("delete", sessionId, () => this.cache.delete(sessionId));
        return null;
      }
      if (remaining !== undefined) {
        return cached;
      }
    }

    const raw = await this.primary.load(sessionId);
    if (raw === null) {
      return null;
    }

    const remaining = await this.remainingMs(sessionId);
    if (remaining !== undefined && remaining !== 0) {
      await this.guard("set", sessionId, () => this.cache.set(sessionId, raw, this.capMs(remaining)));
    }
    return raw;
  }

  async save(sessionId: string, raw: string, ttlSeconds: number | null): Promise<void> {
    await this.primary.save(sessionId, raw, ttlSeconds);
    await this.guard("set", sessionId, () => this.cache.set(sessionId, raw, this.entryTtlMs(ttlSeconds)));
  }

  async delete(sessionId: string): Promise<void> {
    await this.primary.delete(sessionId);
    await this.guard("delete", sessionId, () => this.cache.delete(sessionId));
  }

  async touch(sessionId: string, ttlSeconds: number | null): Promise<boolean> {
    if (this.primary.touch) {
      const found = await this.primary.touch(sessionId, ttlSeconds);
      if (!found) {
        await this.guard("delete", sessionId, () => this.cache.delete(sessionId));
        return false;
      }

      // re-cap a cached copy to the new record TTL
      const cached = await this.guard("get", sessionId, () => this.cache.get(sessionId));
      if (cached !== undefined) {
        await this.guard("set", sessionId, () => this.cache.set(sessionId, cached, this.entryTtlMs(ttlSeconds)));
      }
      return true;
    }

    const raw = await this.primary.load(sessionId);
    if (raw === null) {
      await this.guard("delete", sessionId, () => this.cache.delete(sessionId));
      return false;
    }
    await this.save(sessionId, raw, ttlSeconds);
    return true;
  }

  async has(sessionId: string): Promise<boolean> {
    if (this.primary.has) {
      return this.primary.has(sessionId);
    }
    return (await this.primary.load(sessionId)) !== null;
  }

  async close(): Promise<void> {
    await this.primary.close?.();
  }

  /** `undefined` when the primary cannot tell. */
  private async remainingMs(sessionId: string): Promise<number | null | undefined> {
    return this.primary.ttlMs ? this.primary.ttlMs(sessionId) : undefined;
  }

  private entryTtlMs(ttlSeconds: number | null): number {
    return this.capMs(ttlSeconds === null ? null : secondsToMs(ttlSeconds));
  }

  private capMs(recordTtlMs: number | null): number {
    return recordTtlMs === null ? this.cacheTtlMs : Math.min(this.cacheTtlMs, recordTtlMs);
  }

  private async guard<T>(
    op: "get" | "set" | "delete",
    sessionId: string,
    fn: () => Promise<T>,
  ): Promise<T | undefined> {
    try {
      return await fn();
    } catch (error) {
      this.options?.logger?.warn("Session cache operation failed.", { op, sessionId, error });
      return undefined;
    }
  }
}
