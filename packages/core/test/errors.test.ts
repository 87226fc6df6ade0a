import { describe, expect, it } from "vitest";
import {
  SessionError,
  defaultErrorBody,
  isSessionError,
  statusFromErrorCode,
  toSessionError,
  toStoreError,
} from "../src";

describe("errors", () => {
  it("keeps_session_errors_as_they_are", () => {
    const original = new SessionError("CORRUPT_PAYLOAD", "Stored payload is not valid JSON.");

    expect(toSessionError(original)).toBe(original);
    expect(toStoreError(original, "load", "sid-1")).toBe(original);
  });

  it("wraps_unknown_failures_as_internal_errors", () => {
    const cause = new Error("disk full");

    expect(toSessionError(cause)).toMatchObject({ code: "INTERNAL_ERROR", message: "disk full", cause });
    expect(toSessionError("nope")).toMatchObject({ code: "INTERNAL_ERROR", message: "Unexpected internal error." });
  });

  it("wraps_backend_failures_as_store_unavailable", () => {
    const error = toStoreError(new Error("socket hang up"), "save", "sid-1");

    expect(isSessionError(error)).toBe(true);
    expect(error).toMatchObject({
      code: "STORE_UNAVAILABLE",
      message: "Session store is unavailable.",
      details: { operation: "save", sessionId: "sid-1" },
    });
  });

  it("maps_codes_to_http_status", () => {
    expect(statusFromErrorCode("INVALID_VALUE_TYPE")).toBe(400);
    expect(statusFromErrorCode("STORE_UNAVAILABLE")).toBe(503);
    expect(statusFromErrorCode("IDENTIFIER_COLLISION")).toBe(500);
    expect(statusFromErrorCode("INTERNAL_ERROR")).toBe(500);
  });

  it("builds_error_bodies", () => {
    expect(defaultErrorBody("SESSION_ENDED", "Session was already ended for this request.")).toEqual({
      error: { code: "SESSION_ENDED", message: "Session was already ended for this request." },
    });
  });
});
