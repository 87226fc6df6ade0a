import { z } from "zod";
import { SessionError } from "./errors";
import { DEFAULT_ID_BYTES, MIN_ID_BYTES } from "./session/IdentifierGenerator";

/** 31 days. */
export const DEFAULT_TTL_SECONDS = 31 * 24 * 60 * 60;
export const DEFAULT_KEY_PREFIX = "kvsession:";

const cookieSchema = z.object({
  name: z.string().min(1).default("sid"),
  path: z.string().optional(),
  domain: z.string().optional(),
  httpOnly: z.boolean().optional(),
  secure: z.boolean().optional(),
  sameSite: z.enum(["lax", "strict", "none"]).optional(),
  maxAgeSeconds: z.number().int().nonnegative().optional(),
  /** Omit Max-Age so the cookie ends with the browser session. */
  expireAtBrowserClose: z.boolean().default(false),
});

const backendSchema = z.object({
  url: z.string().optional(),
  host: z.string().default("127.0.0.1"),
  port: z.coerce.number().int().min(1).max(65535).default(6379),
  database: z.coerce.number().int().nonnegative().default(0),
  username: z.string().optional(),
  password: z.string().optional(),
  tls: z.boolean().default(false),
  keyPrefix: z.string().default(DEFAULT_KEY_PREFIX),
  /** Connect attempts before an owned client gives up. */
  connectAttempts: z.coerce.number().int().min(1).default(5),
  connectRetryDelayMs: z.coerce.number().int().nonnegative().default(100),
});

const cacheSchema = z.object({
  enabled: z.boolean().default(false),
  maxEntries: z.coerce.number().int().positive().default(10_000),
  ttlSeconds: z.coerce.number().int().positive().default(60),
});

export const sessionConfigSchema = z.object({
  ttlSeconds: z.coerce.number().int().positive().default(DEFAULT_TTL_SECONDS),
  permanentByDefault: z.boolean().default(false),
  /** Refresh the TTL of unchanged sessions on every request. */
  rolling: z.boolean().default(false),
  /** Propagate store failures from `beginRequest` instead of degrading. */
  strict: z.boolean().default(false),
  idBytes: z.coerce.number().int().min(MIN_ID_BYTES).default(DEFAULT_ID_BYTES),
  maxIdentifierAttempts: z.coerce.number().int().min(1).default(3),
  cookie: cookieSchema.default({}),
  backend: backendSchema.default({}),
  cache: cacheSchema.default({}),
});

export type SessionConfigInput = z.input<typeof sessionConfigSchema>;
export type SessionConfig = DeepReadonly<z.output<typeof sessionConfigSchema>>;
export type CookieConfig = SessionConfig["cookie"];
export type BackendConfig = SessionConfig["backend"];

type DeepReadonly<T> = {
  readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K];
};

/**
 * Validates configuration once at startup and returns a frozen copy.
 */
export function loadSessionConfig(input: SessionConfigInput = {}): SessionConfig {
  return parseConfig(input);
}

function parseConfig(input: unknown): SessionConfig {
  const result = sessionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new SessionError("INVALID_CONFIG", "Invalid session configuration.", result.error, {
      issues: result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    });
  }
  return deepFreeze(result.data);
}

/**
 * Builds configuration from `SESSION_*` and `REDIS_*` environment variables.
 */
export function sessionConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SessionConfig {
  // numeric values arrive as strings; the schema coerces them
  return parseConfig({
    ttlSeconds: env.SESSION_TTL_SECONDS,
    permanentByDefault: parseFlag(env.SESSION_PERMANENT),
    rolling: parseFlag(env.SESSION_ROLLING),
    strict: parseFlag(env.SESSION_STRICT),
    idBytes: env.SESSION_ID_BYTES,
    cookie: {
      name: env.SESSION_COOKIE_NAME,
      domain: env.SESSION_COOKIE_DOMAIN,
      secure: parseFlag(env.SESSION_COOKIE_SECURE),
      expireAtBrowserClose: parseFlag(env.SESSION_EXPIRE_AT_BROWSER_CLOSE),
    },
    backend: {
      url: env.REDIS_URL,
      host: env.REDIS_HOST,
      port: env.REDIS_PORT,
      database: env.REDIS_DATABASE,
      username: env.REDIS_USERNAME,
      password: env.REDIS_PASSWORD,
      keyPrefix: env.SESSION_KEY_PREFIX,
    },
    cache: {
      enabled: parseFlag(env.SESSION_CACHE_ENABLED),
      maxEntries: env.SESSION_CACHE_MAX_ENTRIES,
      ttlSeconds: env.SESSION_CACHE_TTL_SECONDS,
    },
  });
}

function parseFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === "") return undefined;
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
    Object.freeze(value);
  }
  return value;
}
