import { MapSessionStore, type HttpContext, type IdentifierGenerator, type Session } from "../src";

export type StoreCall = {
  op: "load" | "save" | "delete" | "touch" | "has";
  sessionId: string;
  ttlSeconds?: number | null;
};

/**
 * In-memory store that records every call and can be told to fail.
 */
export class RecordingStore extends MapSessionStore {
  readonly calls: StoreCall[] = [];
  failLoads = false;
  failSaves = false;
  failNextDelete = false;

  override async load(sessionId: string): Promise<string | null> {
    this.calls.push({ op: "load", sessionId });
    if (this.failLoads) throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
    return super.load(sessionId);
  }

  override async save(sessionId: string, raw: string, ttlSeconds: number | null): Promise<void> {
    this.calls.push({ op: "save", sessionId, ttlSeconds });
    if (this.failSaves) throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
    return super.save(sessionId, raw, ttlSeconds);
  }

  override async delete(sessionId: string): Promise<void> {
    this.calls.push({ op: "delete", sessionId });
    if (this.failNextDelete) {
      this.failNextDelete = false;
      throw new Error("socket closed");
    }
    return super.delete(sessionId);
  }

  override async touch(sessionId: string, ttlSeconds: number | null): Promise<boolean> {
    this.calls.push({ op: "touch", sessionId, ttlSeconds });
    return super.touch(sessionId, ttlSeconds);
  }

  override async has(sessionId: string): Promise<boolean> {
    this.calls.push({ op: "has", sessionId });
    return super.has(sessionId);
  }

  writes(): StoreCall[] {
    return this.calls.filter((c) => c.op === "save" || c.op === "delete" || c.op === "touch");
  }

  reset(): void {
    this.calls.length = 0;
  }
}

export class FakeClock {
  constructor(public nowMs = 1_700_000_000_000) {}

  readonly now = (): number => this.nowMs;

  advanceSeconds(seconds: number): void {
    this.nowMs += seconds * 1000;
  }
}

/**
 * Hands out the given identifiers in order.
 */
export function sequenceIds(...ids: string[]): IdentifierGenerator {
  const queue = [...ids];
  return {
    generate(): string {
      const next = queue.shift();
      if (next === undefined) throw new Error("identifier sequence exhausted");
      return next;
    },
  };
}

export class SpyLogger {
  readonly entries: Array<{ level: "debug" | "info" | "warn" | "error"; msg: string; meta?: unknown }> = [];

  debug(msg: string, meta?: unknown): void {
    this.entries.push({ level: "debug", msg, meta });
  }

  info(msg: string, meta?: unknown): void {
    this.entries.push({ level: "info", msg, meta });
  }

  warn(msg: string, meta?: unknown): void {
    this.entries.push({ level: "warn", msg, meta });
  }

  error(msg: string, meta?: unknown): void {
    this.entries.push({ level: "error", msg, meta });
  }

  messages(level: "debug" | "info" | "warn" | "error"): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.msg);
  }
}

type CookieRecord = {
  name: string;
  value: string;
  maxAgeSeconds?: number;
};

export class FakeHttpContext implements HttpContext {
  private session: Session | null = null;
  private readonly requestCookies: Map<string, string>;
  readonly setCookies: CookieRecord[] = [];
  readonly clearedCookies: string[] = [];

  constructor(private readonly jar: Map<string, string>) {
    this.requestCookies = new Map(jar);
  }

  getCookie(name: string): string | null {
    return this.requestCookies.get(name) ?? null;
  }

  setCookie(name: string, value: string, options: { maxAgeSeconds?: number }): void {
    this.jar.set(name, value);
    this.setCookies.push({
      name,
      value,
      ...(options.maxAgeSeconds !== undefined ? { maxAgeSeconds: options.maxAgeSeconds } : {}),
    });
  }

  clearCookie(name: string): void {
    this.jar.delete(name);
    this.clearedCookies.push(name);
  }

  setSession(session: Session): void {
    this.session = session;
  }

  getSession(): Session | null {
    return this.session;
  }
}
