import type { CookieConfig } from "../config";
import type { CookieOptions, TokenInstruction } from "../types";
import type { HttpContext } from "./HttpContext";

/** Browsers cap cookie lifetimes at 400 days; used for sessions stored without expiry. */
export const PERSISTENT_COOKIE_MAX_AGE_SECONDS = 400 * 24 * 60 * 60;

/**
 * Cookie attributes for a session token whose record lives `ttlSeconds`.
 */
export function sessionCookieOptions(config: CookieConfig, ttlSeconds: number | null): CookieOptions {
  const base: CookieOptions = {
    ...(config.path !== undefined ? { path: config.path } : {}),
    ...(config.domain !== undefined ? { domain: config.domain } : {}),
    ...(config.httpOnly !== undefined ? { httpOnly: config.httpOnly } : {}),
    ...(config.secure !== undefined ? { secure: config.secure } : {}),
    ...(config.sameSite !== undefined ? { sameSite: config.sameSite } : {}),
  };

  if (config.expireAtBrowserClose) {
    return base;
  }

  return {
    ...base,
    maxAgeSeconds: config.maxAgeSeconds ?? ttlSeconds ?? PERSISTENT_COOKIE_MAX_AGE_SECONDS,
  };
}

/**
 * Applies an end-of-request {@link TokenInstruction} to the response cookies.
 */
export function applyTokenInstruction(ctx: HttpContext, config: CookieConfig, instruction: TokenInstruction): void {
  switch (instruction.kind) {
    case "set":
      ctx.setCookie(config.name, instruction.sessionId, sessionCookieOptions(config, instruction.ttlSeconds));
      return;
    case "unset":
      ctx.clearCookie(config.name, sessionCookieOptions(config, null));
      return;
    case "noop":
      return;
  }
}
