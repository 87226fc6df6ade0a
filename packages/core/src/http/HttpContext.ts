import type { CookieOptions } from "../types";
import type { Session } from "../session/Session";

/**
 * Framework-neutral HTTP context required by the session middleware.
 */
export interface HttpContext {
    // Cookie I/O
    getCookie(name: string): string | null;
    setCookie(name: string, value: string, options: CookieOptions): void;
    clearCookie(name: string, options: CookieOptions): void;

    // Request-scoped session storage
    setSession(session: Session): void;
    getSession(): Session | null;
}

/**
 * Middleware function signature used by the session engine.
 */
export type HttpMiddleware = (ctx: HttpContext, next: () => Promise<void>) => Promise<void>;
