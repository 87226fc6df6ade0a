/**
 * Stable error codes surfaced by the session engine, stores and adapters.
 */
export type ErrorCode =
    | "CORRUPT_PAYLOAD"
    | "STORE_UNAVAILABLE"
    | "IDENTIFIER_COLLISION"
    | "INVALID_VALUE_TYPE"
    | "ENTROPY_UNAVAILABLE"
    | "SESSION_ENDED"
    | "INVALID_CONFIG"
    | "INTERNAL_ERROR";

/**
 * Canonical error type used across kvsession packages.
 */
export class SessionError extends Error {
    readonly details: Record<string, unknown> | undefined;

    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly cause?: unknown,
        details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "SessionError";
        this.details = details;
    }
}

/**
 * JSON-safe error response shape used by adapters.
 */
export type ErrorBody = {
    error: {
        code: ErrorCode;
        message: string;
    };
};

/**
 * Logger contract used by the engine and stores for optional diagnostics.
 */
export type Logger = {
    debug(msg: string, meta?: unknown): void;
    info(msg: string, meta?: unknown): void;
    warn(msg: string, meta?: unknown): void;
    error(msg: string, meta?: unknown): void;
};

/**
 * Creates a normalized error response body.
 */
export function defaultErrorBody(code: ErrorCode, message: string): ErrorBody {
    return { error: { code, message } };
}

/**
 * Type guard for {@link SessionError}.
 */
export function isSessionError(error: unknown): error is SessionError {
    return error instanceof SessionError;
}

/**
 * Converts unknown errors into {@link SessionError}.
 */
export function toSessionError(error: unknown): SessionError {
    if (isSessionError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new SessionError("INTERNAL_ERROR", error.message, error);
    }

    return new SessionError("INTERNAL_ERROR", "Unexpected internal error.", error);
}

/**
 * Wraps a failure raised by a backend. Errors the backend already classified
 * pass through; anything else is reported as an unavailable store.
 */
export function toStoreError(error: unknown, operation: string, sessionId?: string): SessionError {
    if (isSessionError(error)) {
        return error;
    }

    return new SessionError("STORE_UNAVAILABLE", "Session store is unavailable.", error, {
        operation,
        ...(sessionId !== undefined ? { sessionId } : {}),
    });
}

/**
 * Maps {@link ErrorCode} to an HTTP status code.
 */
export function statusFromErrorCode(code: ErrorCode): 400 | 500 | 503 {
    switch (code) {
        case "INVALID_VALUE_TYPE":
            return 400;
        case "STORE_UNAVAILABLE":
            return 503;
        case "CORRUPT_PAYLOAD":
        case "IDENTIFIER_COLLISION":
        case "ENTROPY_UNAVAILABLE":
        case "SESSION_ENDED":
        case "INVALID_CONFIG":
        case "INTERNAL_ERROR":
        default:
            return 500;
    }
}
