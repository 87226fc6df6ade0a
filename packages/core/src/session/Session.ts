import { SessionError } from "../errors";
import { assertSessionValue, type SessionData, type SessionValue } from "./SessionSerializer";

export type SessionState = "active" | "invalidated" | "ended";

/**
 * Initial state handed to {@link Session} by the engine.
 */
export type SessionInit = {
    id: string | null;
    data: SessionData;
    isNew: boolean;
    permanent: boolean;
    createdAt: number;
    lastTouchedAt: number;
    ephemeral?: boolean;
};

/**
 * Request-scoped view of one session.
 *
 * Every mutating call marks the session dirty. Values returned by {@link get}
 * are the live objects; after changing one in place, call {@link markDirty}.
 */
export class Session {
    private data: SessionData;
    private _id: string | null;
    private _isNew: boolean;
    private _isDirty = false;
    private _state: SessionState = "active";
    private _createdAt: number;
    private _lastTouchedAt: number;
    private _regenerated = false;
    private _revokedId: string | null = null;
    private _permanent: boolean;

    readonly isEphemeral: boolean;

    constructor(init: SessionInit) {
        this._id = init.id;
        this.data = init.data;
        this._isNew = init.isNew;
        this._permanent = init.permanent;
        this._createdAt = init.createdAt;
        this._lastTouchedAt = init.lastTouchedAt;
        this.isEphemeral = init.ephemeral ?? false;
    }

    /** Identifier of the stored record, or `null` until the first write. */
    get id(): string | null {
        return this._id;
    }

    get isNew(): boolean {
        return this._isNew;
    }

    get isDirty(): boolean {
        return this._isDirty;
    }

    get state(): SessionState {
        return this._state;
    }

    /** Stored without expiry when set. Changing it marks the session dirty. */
    get permanent(): boolean {
        return this._permanent;
    }

    set permanent(value: boolean) {
        this.assertActive();
        if (value === this._permanent) return;
        this._permanent = value;
        this._isDirty = true;
    }

    get createdAt(): number {
        return this._createdAt;
    }

    get lastTouchedAt(): number {
        return this._lastTouchedAt;
    }

    /** Whether the identifier changed during this request. */
    get wasRegenerated(): boolean {
        return this._regenerated;
    }

    /** Identifier whose record was destroyed during this request, if any. */
    get revokedId(): string | null {
        return this._revokedId;
    }

    get size(): number {
        return Object.keys(this.data).length;
    }

    get isEmpty(): boolean {
        return this.size === 0;
    }

    get(key: string): SessionValue | undefined {
        return Object.prototype.hasOwnProperty.call(this.data, key) ? this.data[key] : undefined;
    }

    has(key: string): boolean {
        return Object.prototype.hasOwnProperty.call(this.data, key);
    }

    keys(): string[] {
        return Object.keys(this.data);
    }

    set(key: string, value: SessionValue): this {
        this.assertActive();
        assertSessionValue(value, `$.${key}`);
        // own property even for "__proto__"
        Object.defineProperty(this.data, key, { value, writable: true, enumerable: true, configurable: true });
        this._isDirty = true;
        return this;
    }

    delete(key: string): boolean {
        this.assertActive();
        if (!this.has(key)) return false;
        delete this.data[key];
        this._isDirty = true;
        return true;
    }

    /** Removes every key. The session is deleted from the store at response time. */
    clear(): void {
        this.assertActive();
        if (this.isEmpty) return;
        this.data = {};
        this._isDirty = true;
    }

    markDirty(): void {
        this.assertActive();
        this._isDirty = true;
    }

    /**
     * Drops all data and schedules removal of the stored record; the transport
     * token is unset at response time.
     */
    invalidate(): void {
        this.assertActive();
        this.data = {};
        this._isDirty = false;
        this._state = "invalidated";
    }

    /** Plain copy of the payload. */
    toJSON(): SessionData {
        return structuredClone(this.data);
    }

    /** @internal */
    snapshot(): SessionData {
        return this.data;
    }

    /** @internal */
    assertActive(): void {
        if (this._state === "ended") {
            throw new SessionError("SESSION_ENDED", "Session was already ended for this request.", undefined, {
                sessionId: this._id,
            });
        }
        if (this._state === "invalidated") {
            throw new SessionError("SESSION_ENDED", "Session was invalidated for this request.", undefined, {
                sessionId: this._id,
            });
        }
    }

    /** @internal */
    markPersisted(id: string, now: number): void {
        this._id = id;
        this._isNew = false;
        this._isDirty = false;
        this._lastTouchedAt = now;
    }

    /** @internal */
    markRegenerated(id: string, now: number): void {
        this.markPersisted(id, now);
        this._regenerated = true;
    }

    /** @internal */
    markTouched(now: number): void {
        this._lastTouchedAt = now;
    }

    /** @internal */
    markDestroyed(now: number): void {
        this._revokedId = this._id ?? this._revokedId;
        this._id = null;
        this.data = {};
        this._isNew = true;
        this._isDirty = false;
        this._regenerated = false;
        this._createdAt = now;
        this._lastTouchedAt = now;
    }

    /** @internal */
    end(): void {
        this._state = "ended";
    }
}
