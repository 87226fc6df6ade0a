/**
 * Key-value backend holding serialized sessions.
 *
 * `ttlSeconds` is the record lifetime; `null` stores the record without expiry.
 * Implementations report connectivity failures as `STORE_UNAVAILABLE`.
 */
export interface SessionStore {
  /** Returns the stored payload, or `null` when absent or expired. */
  load(sessionId: string): Promise<string | null>;
  /** Upserts the record and resets its expiry. Last writer wins. */
  save(sessionId: string, raw: string, ttlSeconds: number | null): Promise<void>;
  /** Removes the record. Deleting an absent record is not an error. */
  delete(sessionId: string): Promise<void>;
  /** Extends expiry without rewriting the payload. Resolves `false` when the record is absent. */
  touch?(sessionId: string, ttlSeconds: number | null): Promise<boolean>;
  /** Reports whether a record exists; used to detect identifier collisions. */
  has?(sessionId: string): Promise<boolean>;
  /**
   * Remaining lifetime of the record in milliseconds: `null` when it never
   * expires, `0` when it is absent or expired.
   */
  ttlMs?(sessionId: string): Promise<number | null>;
  close?(): Promise<void>;
}
