import { randomBytes } from "node:crypto";
import { SessionError } from "../errors";

/** Smallest accepted identifier size: 128 bits of entropy. */
export const MIN_ID_BYTES = 16;
export const DEFAULT_ID_BYTES = 32;

/**
 * Source of session identifiers.
 */
export interface IdentifierGenerator {
    generate(): string;
}

/**
 * Draws identifiers from the operating system CSPRNG and renders them as
 * unpadded base64url, so every identifier of a given size has the same length.
 */
export class RandomIdentifierGenerator implements IdentifierGenerator {
    private readonly byteLength: number;

    constructor(byteLength: number = DEFAULT_ID_BYTES) {
        if (!Number.isInteger(byteLength) || byteLength < MIN_ID_BYTES) {
            throw new SessionError(
                "INVALID_CONFIG",
                `Identifier size must be an integer of at least ${MIN_ID_BYTES} bytes.`,
                undefined,
                { byteLength }
            );
        }
        this.byteLength = byteLength;
    }

    generate(): string {
        let bytes: Buffer;
        try {
            bytes = randomBytes(this.byteLength);
        } catch (error) {
            throw new SessionError("ENTROPY_UNAVAILABLE", "Secure random source is unavailable.", error);
        }
        return bytes.toString("base64url");
    }
}

/**
 * Length of an identifier produced by {@link RandomIdentifierGenerator} for the given size.
 */
export function identifierLength(byteLength: number): number {
    return Math.ceil((byteLength * 4) / 3);
}
