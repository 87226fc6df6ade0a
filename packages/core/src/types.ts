import type {SessionStore} from "./store/SessionStore";
import type {Logger} from "./errors";
import type {IdentifierGenerator} from "./session/IdentifierGenerator";
import type {SessionData, SessionSerializer, SessionValue} from "./session/SessionSerializer";
import type {SessionConfig} from "./config";
import type {Clock} from "./utils/time";

/**
 * Cookie attributes applied by framework adapters.
 */
export type CookieOptions = {
    path?: string; // default "/"
    domain?: string;
    httpOnly?: boolean; // default true
    secure?: boolean;
    sameSite?: "lax" | "strict" | "none";
    maxAgeSeconds?: number; // omitted -> browser-session cookie
};

/**
 * What the transport layer must do with the session token once a request ends.
 *
 * `ttlSeconds: null` means the stored record has no expiry.
 */
export type TokenInstruction =
    | { kind: "set"; sessionId: string; ttlSeconds: number | null }
    | { kind: "unset"; sessionId: string }
    | { kind: "noop" };

/**
 * Collaborators for creating a {@link SessionEngine}.
 */
export type SessionEngineOptions = {
    store: SessionStore;
    config: SessionConfig;

    serializer?: SessionSerializer;
    idGenerator?: IdentifierGenerator;
    clock?: Clock;

    logger?: Logger;
};

// Re-export commonly used types
export type {SessionStore, Logger, SessionData, SessionValue, SessionConfig};
