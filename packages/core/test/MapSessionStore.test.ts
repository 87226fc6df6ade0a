import { afterEach, describe, expect, it } from "vitest";
import { MapSessionStore } from "../src";
import { FakeClock } from "./helpers";

describe("MapSessionStore", () => {
  const stores: MapSessionStore[] = [];
  function create(clock = new FakeClock(), maxSize?: number) {
    const store = new MapSessionStore({ clock: clock.now, ...(maxSize !== undefined ? { maxSize } : {}) });
    stores.push(store);
    return store;
  }

  afterEach(async () => {
    await Promise.all(stores.map((s) => s.close()));
    stores.length = 0;
  });

  it("returns_null_for_unknown_ids", async () => {
    const store = create();
    expect(await store.load("missing")).toBeNull();
    expect(await store.has("missing")).toBe(false);
  });

  it("overwrites_on_save", async () => {
    const store = create();
    await store.save("a", "one", 60);
    await store.save("a", "two", 60);

    expect(await store.load("a")).toBe("two");
    expect(store.size).toBe(1);
  });

  it("expires_records_after_their_ttl", async () => {
    const clock = new FakeClock();
    const store = create(clock);
    await store.save("a", "payload", 10);

    clock.advanceSeconds(9);
    expect(await store.load("a")).toBe("payload");

    clock.advanceSeconds(1);
    expect(await store.load("a")).toBeNull();
    expect(store.size).toBe(0);
  });

  it("keeps_records_without_ttl", async () => {
    const clock = new FakeClock();
    const store = create(clock);
    await store.save("a", "payload", null);

    clock.advanceSeconds(365 * 24 * 60 * 60);
    expect(await store.load("a")).toBe("payload");
  });

  it("touch_extends_expiry_of_live_records_only", async () => {
    const clock = new FakeClock();
    const store = create(clock);
    await store.save("a", "payload", 10);

    clock.advanceSeconds(8);
    expect(await store.touch("a", 10)).toBe(true);
    clock.advanceSeconds(8);
    expect(await store.load("a")).toBe("payload");

    clock.advanceSeconds(3);
    expect(await store.touch("a", 10)).toBe(false);
    expect(await store.touch("never", 10)).toBe(false);
  });

  it("touch_with_null_ttl_removes_expiry", async () => {
    const clock = new FakeClock();
    const store = create(clock);
    await store.save("a", "payload", 10);

    await store.touch("a", null);
    clock.advanceSeconds(1000);
    expect(await store.has("a")).toBe(true);
  });

  it("reports_remaining_lifetime", async () => {
    const clock = new FakeClock();
    const store = create(clock);
    await store.save("a", "payload", 10);
    await store.save("b", "payload", null);

    clock.advanceSeconds(4);
    expect(await store.ttlMs("a")).toBe(6000);
    expect(await store.ttlMs("b")).toBeNull();
    expect(await store.ttlMs("missing")).toBe(0);

    clock.advanceSeconds(6);
    expect(await store.ttlMs("a")).toBe(0);
  });

  it("delete_is_idempotent", async () => {
    const store = create();
    await store.save("a", "payload", 60);

    await store.delete("a");
    await store.delete("a");

    expect(await store.load("a")).toBeNull();
  });

  it("evicts_oldest_record_at_capacity", async () => {
    const store = create(new FakeClock(), 2);
    await store.save("a", "1", 60);
    await store.save("b", "2", 60);
    await store.save("c", "3", 60);

    expect(await store.load("a")).toBeNull();
    expect(await store.load("b")).toBe("2");
    expect(await store.load("c")).toBe("3");
  });

  it("prefers_sweeping_expired_records_over_eviction", async () => {
    const clock = new FakeClock();
    const store = create(clock, 2);
    await store.save("short", "1", 5);
    await store.save("long", "2", 60);

    clock.advanceSeconds(6);
    await store.save("new", "3", 60);

    expect(await store.load("long")).toBe("2");
    expect(await store.load("new")).toBe("3");
  });
});
