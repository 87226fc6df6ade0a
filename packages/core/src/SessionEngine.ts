import type { SessionEngineOptions, TokenInstruction } from "./types";
import type { HttpMiddleware, HttpContext } from "./http/HttpContext";
import type { SessionConfig } from "./config";
import type { SessionStore } from "./store/SessionStore";
import { applyTokenInstruction } from "./http/tokenCookie";
import { Session } from "./session/Session";
import { type IdentifierGenerator, RandomIdentifierGenerator } from "./session/IdentifierGenerator";
import { JsonSessionSerializer, type SessionData, type SessionSerializer } from "./session/SessionSerializer";
import { type Logger, SessionError, toStoreError } from "./errors";
import { type Clock, systemClock } from "./utils/time";

type StoreOperation = "load" | "save" | "delete" | "touch" | "has";

/**
 * Session lifecycle engine.
 *
 * Bracket each request with {@link beginRequest} and {@link endRequest}. Nothing
 * is written to the store between the two calls except by {@link regenerate}
 * and {@link destroy}. Concurrent requests for one session each work on their
 * own copy and the last `save` wins.
 */
export class SessionEngine {
    readonly config: SessionConfig;

    private readonly store: SessionStore;
    private readonly serializer: SessionSerializer;
    private readonly idGenerator: IdentifierGenerator;
    private readonly clock: Clock;
    private readonly logger: Logger | undefined;

    constructor(opts: SessionEngineOptions) {
        this.config = opts.config;
        this.store = opts.store;
        this.serializer = opts.serializer ?? new JsonSessionSerializer();
        this.idGenerator = opts.idGenerator ?? new RandomIdentifierGenerator(opts.config.idBytes);
        this.clock = opts.clock ?? systemClock;
        this.logger = opts.logger;
    }

    /**
     * Resolves the incoming identifier into a session. Unknown, expired and
     * corrupt records all yield a new empty session that has no identifier yet.
     */
    async beginRequest(incomingId?: string | null): Promise<Session> {
        const now = this.clock();
        if (!incomingId) {
            return this.newSession(now);
        }

        let raw: string | null;
        try {
            raw = await this.store.load(incomingId);
        } catch (error) {
            const storeError = toStoreError(error, "load", incomingId);
            if (this.config.strict || storeError.code !== "STORE_UNAVAILABLE") {
                throw storeError;
            }
            this.logger?.warn("Session store unavailable; continuing with an ephemeral session.", {
                sessionId: incomingId,
                error: storeError,
            });
            return this.newSession(now, true);
        }

        if (raw === null) {
            this.logger?.debug("Session not found.", { sessionId: incomingId });
            return this.newSession(now);
        }

        let decoded: ReturnType<SessionSerializer["decode"]>;
        try {
            decoded = this.serializer.decode(raw);
        } catch (error) {
            this.logger?.warn("Invalid session payload.", { sessionId: incomingId, error });
            return this.newSession(now);
        }

        return new Session({
            id: incomingId,
            data: decoded.data,
            isNew: false,
            permanent: decoded.meta.permanent,
            createdAt: decoded.meta.createdAt ?? now,
            lastTouchedAt: now,
        });
    }

    /**
     * Persists or discards the session and tells the transport layer what to do
     * with the token. The session cannot be used afterwards.
     */
    async endRequest(session: Session): Promise<TokenInstruction> {
        if (session.state === "ended") {
            throw new SessionError("SESSION_ENDED", "Session was already ended for this request.", undefined, {
                sessionId: session.id,
            });
        }

        const instruction = await this.commit(session);
        session.end();
        return instruction;
    }

    /**
     * Moves the payload to a fresh identifier and removes the old record.
     * On failure the session keeps its old identifier and the old record is intact.
     */
    async regenerate(session: Session): Promise<void> {
        session.assertActive();

        const oldId = session.id;
        if (oldId === null) {
            // nothing stored under a client-visible id yet
            return;
        }

        const raw = this.encode(session);
        const newId = await this.allocateIdentifier();
        const ttl = this.ttlFor(session);

        await this.call("save", newId, () => this.store.save(newId, raw, ttl));

        try {
            await this.store.delete(oldId);
        } catch (error) {
            try {
                await this.store.delete(newId);
            } catch (rollbackError) {
                this.logger?.error("Failed to remove regenerated session after rollback.", {
                    sessionId: newId,
                    error: rollbackError,
                });
            }
            throw toStoreError(error, "delete", oldId);
        }

        session.markRegenerated(newId, this.clock());
    }

    /**
     * Deletes the stored record right away and leaves an empty new session in
     * its place. Unless the request writes again, the token is unset at response time.
     */
    async destroy(session: Session): Promise<void> {
        session.assertActive();

        const id = session.id;
        if (id !== null) {
            await this.call("delete", id, () => this.store.delete(id));
        }
        session.markDestroyed(this.clock());
    }

    /**
     * Framework-neutral middleware: loads the session from the configured
     * cookie, runs the handler, then saves and updates the cookie. A handler
     * that throws leaves the store untouched.
     */
    middleware(): HttpMiddleware {
        const cookie = this.config.cookie;
        return async (ctx, next) => {
            const session = await this.beginRequest(ctx.getCookie(cookie.name));
            ctx.setSession(session);
            await next();

            const instruction = await this.endRequest(session);
            applyTokenInstruction(ctx, cookie, instruction);
        };
    }

    /**
     * Session attached by {@link middleware}, or `null` outside it.
     */
    getSession(ctx: HttpContext): Session | null {
        return ctx.getSession();
    }

    async close(): Promise<void> {
        await this.store.close?.();
    }

    private async commit(session: Session): Promise<TokenInstruction> {
        if (session.isEphemeral) {
            return { kind: "noop" };
        }

        if (session.state === "invalidated") {
            return this.remove(session.id ?? session.revokedId);
        }

        if (session.isDirty) {
            if (session.isEmpty) {
                // empty sessions are never stored
                return this.remove(session.id ?? session.revokedId);
            }
            return this.persist(session);
        }

        const id = session.id;
        if (id !== null) {
            if (this.config.rolling) {
                return this.refresh(session, id);
            }
            if (session.wasRegenerated) {
                return { kind: "set", sessionId: id, ttlSeconds: this.ttlFor(session) };
            }
            return { kind: "noop" };
        }

        if (session.revokedId !== null) {
            return { kind: "unset", sessionId: session.revokedId };
        }

        return { kind: "noop" };
    }

    private async persist(session: Session): Promise<TokenInstruction> {
        const raw = this.encode(session);
        const id = session.id ?? (await this.allocateIdentifier());
        const ttl = this.ttlFor(session);

        await this.call("save", id, () => this.store.save(id, raw, ttl));
        session.markPersisted(id, this.clock());

        return { kind: "set", sessionId: id, ttlSeconds: ttl };
    }

    private async remove(id: string | null): Promise<TokenInstruction> {
        if (id === null) {
            return { kind: "noop" };
        }
        await this.call("delete", id, () => this.store.delete(id));
        return { kind: "unset", sessionId: id };
    }

    private async refresh(session: Session, id: string): Promise<TokenInstruction> {
        const ttl = this.ttlFor(session);
        const store = this.store;
        const touch = store.touch?.bind(store);

        let found: boolean;
        if (touch) {
            found = await this.call("touch", id, () => touch(id, ttl));
        } else {
            const raw = await this.call("load", id, () => store.load(id));
            found = raw !== null;
            if (raw !== null) {
                await this.call("save", id, () => store.save(id, raw, ttl));
            }
        }

        if (!found) {
            this.logger?.debug("Session disappeared before its expiry could be refreshed.", { sessionId: id });
            return { kind: "noop" };
        }

        session.markTouched(this.clock());
        return { kind: "set", sessionId: id, ttlSeconds: ttl };
    }

    private encode(session: Session): string {
        const data: SessionData = session.snapshot();
        return this.serializer.encode(data, { permanent: session.permanent, createdAt: session.createdAt });
    }

    private async allocateIdentifier(): Promise<string> {
        const attempts = this.config.maxIdentifierAttempts;
        const has = this.store.has?.bind(this.store);

        for (let attempt = 1; attempt <= attempts; attempt++) {
            const id = this.idGenerator.generate();
            if (!has) {
                return id;
            }

            const taken = await this.call("has", id, () => has(id));
            if (!taken) {
                return id;
            }

            this.logger?.warn("Session identifier collision; generating another.", { attempt });
        }

        throw new SessionError(
            "IDENTIFIER_COLLISION",
            "Could not allocate an unused session identifier.",
            undefined,
            { attempts }
        );
    }

    private ttlFor(session: Session): number | null {
        return session.permanent ? null : this.config.ttlSeconds;
    }

    private newSession(now: number, ephemeral = false): Session {
        return new Session({
            id: null,
            data: {},
            isNew: true,
            permanent: this.config.permanentByDefault,
            createdAt: now,
            lastTouchedAt: now,
            ephemeral,
        });
    }

    private async call<T>(operation: StoreOperation, sessionId: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            throw toStoreError(error, operation, sessionId);
        }
    }
}
