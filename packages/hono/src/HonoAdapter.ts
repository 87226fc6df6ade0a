import {
  defaultErrorBody,
  isSessionError,
  statusFromErrorCode,
  type CookieOptions,
  type HttpContext,
  type HttpMiddleware,
  type Session,
  type SessionEngine,
  type SessionError,
} from "@kvsession/core";
import type { Context, MiddlewareHandler } from "hono";
import { parse as parseCookie, serialize as serializeCookie, type CookieSerializeOptions } from "cookie";

/**
 * Hono environment populated by the session middleware.
 */
export type SessionEnv = {
  Variables: {
    session: Session | undefined;
  };
};

/**
 * Adapter options for Hono integration.
 */
export type HonoSessionAdapterOptions = {
  onError?: (error: SessionError, c: Context<SessionEnv>) => Promise<Response | void> | Response | void;
};

/**
 * Creates a framework-neutral `HttpContext` from Hono context.
 */
export function createHonoHttpContext(c: Context<SessionEnv>): HttpContext {
  return {
    getCookie(name: string): string | null {
      const raw = c.req.header("cookie");
      if (!raw) {
        return null;
      }

      const parsed = parseCookie(raw);
      return parsed[name] ?? null;
    },

    setCookie(name, value, options) {
      c.header("Set-Cookie", serializeCookie(name, value, toSerializeOptions(options)), { append: true });
    },

    clearCookie(name, options) {
      c.header("Set-Cookie", serializeCookie(name, "", { ...toSerializeOptions(options), maxAge: 0 }), {
        append: true,
      });
    },

    setSession(session: Session): void {
      c.set("session", session);
    },

    getSession(): Session | null {
      return c.get("session") ?? null;
    },
  };
}

/**
 * Converts core middleware into a Hono middleware handler.
 *
 * Session errors become JSON error responses. When the route handler fails,
 * the session is not saved and Hono's own error response is kept.
 */
export function toHonoMiddleware(
  middleware: HttpMiddleware,
  options?: HonoSessionAdapterOptions,
): MiddlewareHandler<SessionEnv> {
  return async (c, next) => {
    const ctx = createHonoHttpContext(c);

    let handlerFailed = false;
    try {
      await middleware(ctx, async () => {
        await next();
        if (c.error) {
          handlerFailed = true;
          throw c.error;
        }
      });
    } catch (error) {
      if (handlerFailed) {
        return;
      }

      if (!isSessionError(error)) {
        throw error;
      }

      if (options?.onError) {
        const handled = await options.onError(error, c);
        if (handled) {
          return handled;
        }
        if (c.finalized) {
          return;
        }
      }
      return c.json(defaultErrorBody(error.code, error.message), statusFromErrorCode(error.code));
    }
  };
}

/**
 * Session middleware for a {@link SessionEngine}.
 */
export function honoSession(engine: SessionEngine, options?: HonoSessionAdapterOptions): MiddlewareHandler<SessionEnv> {
  return toHonoMiddleware(engine.middleware(), options);
}

/**
 * Session attached by {@link honoSession}, or `null` outside it.
 */
export function getHonoSession(c: Context<SessionEnv>): Session | null {
  return c.get("session") ?? null;
}

function toSerializeOptions(options: CookieOptions): CookieSerializeOptions {
  return {
    path: options.path ?? "/",
    httpOnly: options.httpOnly ?? true,
    ...(options.domain !== undefined ? { domain: options.domain } : {}),
    ...(options.secure !== undefined ? { secure: options.secure } : {}),
    ...(options.sameSite !== undefined ? { sameSite: options.sameSite } : {}),
    ...(options.maxAgeSeconds !== undefined ? { maxAge: options.maxAgeSeconds } : {}),
  };
}
