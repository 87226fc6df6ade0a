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
import { parse as parseCookie, serialize as serializeCookie, type CookieSerializeOptions } from "cookie";

export type ExpressSessionRequest = {
  headers: Record<string, string | string[] | undefined>;
  session?: Session;
};

export type ExpressSessionResponse = {
  statusCode: number;
  status(code: number): unknown;
  json(body: unknown): unknown;
  getHeader(name: string): unknown;
  setHeader(name: string, value: string | string[]): unknown;
  end(...args: unknown[]): unknown;
  once(event: "close", listener: () => void): unknown;
};

export type ExpressNext = (error?: unknown) => void;
export type ExpressSessionHandler = (
  req: ExpressSessionRequest,
  res: ExpressSessionResponse,
  next: ExpressNext,
) => Promise<void>;

export type ExpressSessionAdapterOptions = {
  onError?: (error: SessionError, req: ExpressSessionRequest, res: ExpressSessionResponse) => Promise<void> | void;
};

export function createExpressHttpContext(req: ExpressSessionRequest, res: ExpressSessionResponse): HttpContext {
  return {
    getCookie(name: string): string | null {
      const header = req.headers.cookie;
      if (!header) {
        return null;
      }

      const parsed = parseCookie(Array.isArray(header) ? header.join("; ") : header);
      return parsed[name] ?? null;
    },

    setCookie(name, value, options) {
      appendSetCookie(res, serializeCookie(name, value, toSerializeOptions(options)));
    },

    clearCookie(name, options) {
      appendSetCookie(res, serializeCookie(name, "", { ...toSerializeOptions(options), maxAge: 0 }));
    },

    setSession(session: Session): void {
      req.session = session;
    },

    getSession(): Session | null {
      return req.session ?? null;
    },
  };
}

/**
 * Raised inside the core middleware when the route must not be saved: it
 * ended with a 5xx status, or the connection closed before the response ended.
 */
class UnsavedResponse extends Error {}

/**
 * Converts core middleware into an Express-style handler.
 *
 * `next` is called straight away so the route runs; the session is saved when
 * the route ends the response, and `res.end` is held back until the
 * `Set-Cookie` header is in place. A response ended with a 5xx status (an
 * error handler's) or closed without ending leaves the store untouched.
 */
export function toExpressMiddleware(
  middleware: HttpMiddleware,
  options?: ExpressSessionAdapterOptions,
): ExpressSessionHandler {
  return async (req, res, next) => {
    const ctx = createExpressHttpContext(req, res);
    const originalEnd = res.end;
    const pending: { endArgs: unknown[] | null } = { endArgs: null };

    try {
      await middleware(ctx, () => {
        return new Promise<void>((resolve, reject) => {
          res.once("close", () => {
            reject(new UnsavedResponse("Response closed before it was ended."));
          });
          res.end = (...args: unknown[]) => {
            pending.endArgs = args;
            if (res.statusCode >= 500) {
              reject(new UnsavedResponse("Route failed."));
            } else {
              resolve();
            }
            return res;
          };
          next();
        });
      });
    } catch (error) {
      res.end = originalEnd;
      if (error instanceof UnsavedResponse) {
        if (pending.endArgs !== null) {
          res.end(...pending.endArgs);
        }
        return;
      }
      if (!isSessionError(error)) {
        next(error);
        return;
      }

      if (options?.onError) {
        await options.onError(error, req, res);
        return;
      }

      res.status(statusFromErrorCode(error.code));
      res.json(defaultErrorBody(error.code, error.message));
      return;
    }

    res.end = originalEnd;
    if (pending.endArgs !== null) {
      res.end(...pending.endArgs);
    }
  };
}

/**
 * Session middleware for a {@link SessionEngine}.
 */
export function expressSession(engine: SessionEngine, options?: ExpressSessionAdapterOptions): ExpressSessionHandler {
  return toExpressMiddleware(engine.middleware(), options);
}

function appendSetCookie(res: ExpressSessionResponse, value: string): void {
  const prev = res.getHeader("Set-Cookie");

  if (!prev) {
    res.setHeader("Set-Cookie", value);
    return;
  }

  const list = Array.isArray(prev) ? prev.map(String) : [String(prev)];
  list.push(value);
  res.setHeader("Set-Cookie", list);
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
