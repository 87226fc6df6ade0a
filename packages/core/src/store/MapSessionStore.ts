import type { SessionStore } from "./SessionStore";
import { type Clock, secondsToMs, systemClock } from "../utils/time";

type Entry = { raw: string; expiresAt: number | null };

export type MapSessionStoreOptions = {
    cleanupIntervalSeconds?: number; // default 60
    maxSize?: number; // optional safety
    clock?: Clock;
};

export class MapSessionStore implements SessionStore {
    private readonly map = new Map<string, Entry>();
    private readonly cleanupTimer: NodeJS.Timeout | null;
    private readonly clock: Clock;

    constructor(private readonly options?: MapSessionStoreOptions) {
        this.clock = options?.clock ?? systemClock;
        const interval = secondsToMs(options?.cleanupIntervalSeconds ?? 60);
        this.cleanupTimer = setInterval(() => this.cleanup(), interval);
        this.cleanupTimer.unref?.();
    }

    async load(sessionId: string): Promise<string | null> {
        const e = this.liveEntry(sessionId);
        return e ? e.raw : null;
    }

    async save(sessionId: string, raw: string, ttlSeconds: number | null): Promise<void> {
        if (this.options?.maxSize && !this.map.has(sessionId) && this.map.size >= this.options.maxSize) {
            this.cleanup();
            if (this.map.size >= this.options.maxSize) {
                const firstKey = this.map.keys().next().value;
                if (firstKey !== undefined) this.map.delete(firstKey);
            }
        }

        this.map.set(sessionId, { raw, expiresAt: this.expiryFor(ttlSeconds) });
    }

    async delete(sessionId: string): Promise<void> {
        this.map.delete(sessionId);
    }

    async touch(sessionId: string, ttlSeconds: number | null): Promise<boolean> {
        const e = this.liveEntry(sessionId);
        if (!e) return false;

        e.expiresAt = this.expiryFor(ttlSeconds);
        return true;
    }

    async has(sessionId: string): Promise<boolean> {
        return this.liveEntry(sessionId) !== null;
    }

    async ttlMs(sessionId: string): Promise<number | null> {
        const e = this.liveEntry(sessionId);
        if (!e) return 0;
        return e.expiresAt === null ? null : e.expiresAt - this.clock();
    }

    async close(): Promise<void> {
        if (this.cleanupTimer) clearInterval(this.cleanupTimer);
        this.map.clear();
    }

    /** Number of records currently held, expired ones included until swept. */
    get size(): number {
        return this.map.size;
    }

    private liveEntry(sessionId: string): Entry | null {
        const e = this.map.get(sessionId);
        if (!e) return null;

        if (e.expiresAt !== null && this.clock() >= e.expiresAt) {
            this.map.delete(sessionId);
            return null;
        }
        return e;
    }

    private expiryFor(ttlSeconds: number | null): number | null {
        return ttlSeconds === null ? null : this.clock() + secondsToMs(ttlSeconds);
    }

    private cleanup(): void {
        const now = this.clock();
        for (const [k, e] of this.map.entries()) {
            if (e.expiresAt !== null && now >= e.expiresAt) this.map.delete(k);
        }
    }
}
