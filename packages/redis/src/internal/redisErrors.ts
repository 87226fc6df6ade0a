import { SessionError } from "@kvsession/core";

export type RedisOperation = "connect" | "load" | "save" | "delete" | "touch" | "has" | "ttl";

const STORE_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "EAI_AGAIN", "EPIPE", "NR_CLOSED"]);

const STORE_KEYWORDS = [
  "connect",
  "connection",
  "socket",
  "closed",
  "timeout",
  "read only",
  "loading",
  "clusterdown",
  "try again",
  "no connection",
  "the client is closed",
];

/**
 * Connection-class failures are reported as an unavailable store; anything
 * else (wrong type, bad argument, script error) is an internal error.
 */
export function classifyRedisError(error: unknown): "STORE_UNAVAILABLE" | "INTERNAL_ERROR" {
  if (STORE_CODES.has(getErrorCode(error))) {
    return "STORE_UNAVAILABLE";
  }

  const msg = getErrorMessage(error).toLowerCase();
  if (STORE_KEYWORDS.some((k) => msg.includes(k))) {
    return "STORE_UNAVAILABLE";
  }

  return "INTERNAL_ERROR";
}

export function toRedisError(
  error: unknown,
  operation: RedisOperation,
  details?: Record<string, unknown>,
): SessionError {
  if (error instanceof SessionError) {
    return error;
  }

  const code = classifyRedisError(error);
  return new SessionError(
    code,
    code === "STORE_UNAVAILABLE" ? "Session store is unavailable." : "Redis operation failed.",
    error,
    {
      ...details,
      operation,
      redisCode: getErrorCode(error),
    },
  );
}

function getErrorCode(error: unknown): string {
  if (typeof error === "object" && error !== null && "code" in error) {
    return String(error.code ?? "").toUpperCase();
  }
  return "";
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error ?? "");
}
