import { SessionError } from "../errors";

/**
 * Values a session may hold. Anything else is rejected at write time.
 */
export type SessionValue =
    | string
    | number
    | boolean
    | null
    | SessionValue[]
    | { [key: string]: SessionValue };

/**
 * Payload of one session: string keys to {@link SessionValue}s.
 */
export type SessionData = { [key: string]: SessionValue };

/**
 * Record-level attributes stored beside the payload.
 */
export type PayloadMeta = {
    permanent: boolean;
    createdAt: number | null;
};

export type DecodedPayload = {
    data: SessionData;
    meta: PayloadMeta;
};

/**
 * Converts session payloads to and from their stored form.
 */
export interface SessionSerializer {
    encode(data: SessionData, meta?: Partial<PayloadMeta>): string;
    decode(raw: string): DecodedPayload;
}

export const PAYLOAD_FORMAT_VERSION = 1;

type Envelope = {
    v: number;
    createdAt?: number;
    permanent?: true;
    data: SessionData;
};

/**
 * JSON serializer writing a versioned envelope:
 * `{"v":1,"createdAt":1700000000000,"data":{...}}`.
 *
 * `-0` is written as `0`; every other supported value decodes to an equal one.
 */
export class JsonSessionSerializer implements SessionSerializer {
    encode(data: SessionData, meta?: Partial<PayloadMeta>): string {
        assertSessionData(data);
        const envelope: Envelope = {
            v: PAYLOAD_FORMAT_VERSION,
            ...(typeof meta?.createdAt === "number" ? { createdAt: meta.createdAt } : {}),
            ...(meta?.permanent ? { permanent: true as const } : {}),
            data,
        };
        return JSON.stringify(envelope);
    }

    decode(raw: string): DecodedPayload {
        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            throw corrupt("Stored payload is not valid JSON.", error);
        }

        if (!isPlainObject(parsed)) {
            throw corrupt("Stored payload is not an envelope.");
        }

        if (parsed.v !== PAYLOAD_FORMAT_VERSION) {
            throw corrupt("Stored payload has an unsupported format version.", undefined, {
                version: parsed.v ?? null,
            });
        }

        let createdAt: number | null = null;
        if (parsed.createdAt !== undefined) {
            if (!isFiniteNumber(parsed.createdAt)) {
                throw corrupt("Stored payload has an invalid creation time.");
            }
            createdAt = parsed.createdAt;
        }

        let permanent = false;
        if (parsed.permanent !== undefined) {
            if (typeof parsed.permanent !== "boolean") {
                throw corrupt("Stored payload has an invalid permanent flag.");
            }
            permanent = parsed.permanent;
        }

        const data = parsed.data;
        if (!isPlainObject(data)) {
            throw corrupt("Stored payload data is not a mapping.");
        }

        try {
            assertSessionData(data);
        } catch (error) {
            throw corrupt("Stored payload contains unsupported values.", error);
        }

        return {
            data,
            meta: { permanent, createdAt },
        };
    }
}

/**
 * Throws `INVALID_VALUE_TYPE` unless `data` is a mapping of supported values.
 */
export function assertSessionData(data: unknown): asserts data is SessionData {
    if (!isPlainObject(data)) {
        throw invalid("$", "session data must be a plain object");
    }
    const seen = new Set<object>();
    for (const [key, value] of Object.entries(data)) {
        checkValue(value, `$.${key}`, seen);
    }
}

/**
 * Throws `INVALID_VALUE_TYPE` unless `value` is a {@link SessionValue}.
 */
export function assertSessionValue(value: unknown, path: string = "$"): asserts value is SessionValue {
    checkValue(value, path, new Set<object>());
}

function checkValue(value: unknown, path: string, seen: Set<object>): void {
    if (value === null || typeof value === "string" || typeof value === "boolean") return;

    if (typeof value === "number") {
        if (!Number.isFinite(value)) throw invalid(path, "numbers must be finite");
        return;
    }

    if (typeof value !== "object") {
        throw invalid(path, `unsupported type "${typeof value}"`);
    }

    if (seen.has(value)) {
        throw invalid(path, "cyclic reference");
    }

    if (Array.isArray(value)) {
        seen.add(value);
        for (let index = 0; index < value.length; index++) {
            if (!(index in value)) throw invalid(`${path}[${index}]`, "sparse arrays are not supported");
            checkValue(value[index], `${path}[${index}]`, seen);
        }
        seen.delete(value);
        return;
    }

    if (!isPlainObject(value)) {
        throw invalid(path, `unsupported object type ${Object.prototype.toString.call(value)}`);
    }

    seen.add(value);
    for (const [key, item] of Object.entries(value)) {
        checkValue(item, `${path}.${key}`, seen);
    }
    seen.delete(value);
}

function isFiniteNumber(value: unknown): value is number {
    return typeof value === "number" && Number.isFinite(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

function invalid(path: string, reason: string): SessionError {
    return new SessionError("INVALID_VALUE_TYPE", `Unsupported session value at ${path}: ${reason}.`, undefined, {
        path,
    });
}

function corrupt(message: string, cause?: unknown, details?: Record<string, unknown>): SessionError {
    return new SessionError("CORRUPT_PAYLOAD", message, cause, details);
}
