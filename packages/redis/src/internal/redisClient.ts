import { SessionError, type Logger } from "@kvsession/core";
import { toRedisError } from "./redisErrors";

/**
 * Subset of Redis commands used by the session store. Both node-redis
 * (`setEx`, `pTTL`) and ioredis (`setex`, `pttl`) clients fit this shape.
 */
export interface RedisClientLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  expire(key: string, ttlSeconds: number): Promise<number | boolean>;
  persist(key: string): Promise<number | boolean>;
  exists(key: string): Promise<number>;
  setEx?(key: string, ttlSeconds: number, value: string): Promise<unknown>;
  setex?(key: string, ttlSeconds: number, value: string): Promise<unknown>;
  pTTL?(key: string): Promise<number>;
  pttl?(key: string): Promise<number>;
  connect?(): Promise<unknown>;
  quit?(): Promise<unknown>;
  disconnect?(): Promise<unknown>;
  isOpen?: boolean;
  status?: string;
}

export type RedisConnectionParams = {
  url?: string;
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  database?: number;
  tls?: boolean;
};

export type RedisClientWrapper = {
  client: RedisClientLike;
  manageClient?: boolean;
  lazyConnect?: boolean;
};

export type RedisConnectionInput = RedisClientLike | RedisClientWrapper | RedisConnectionParams;

export type RedisClientManagerOptions = {
  connectAttempts?: number; // default 5
  connectRetryDelayMs?: number; // default 100
  logger?: Logger;
};

export class RedisClientManager {
  private readonly ownClient: boolean;
  private readonly lazyConnect: boolean;
  private readonly connectAttempts: number;
  private readonly connectRetryDelayMs: number;
  private readonly logger: Logger | undefined;
  private client: RedisClientLike | null = null;
  private connecting: Promise<RedisClientLike> | null = null;

  constructor(
    private readonly connectionInput: RedisConnectionInput,
    options?: RedisClientManagerOptions,
  ) {
    this.connectAttempts = options?.connectAttempts ?? 5;
    this.connectRetryDelayMs = options?.connectRetryDelayMs ?? 100;
    this.logger = options?.logger;

    if (isRedisClientLike(connectionInput)) {
      this.ownClient = false;
      this.lazyConnect = false;
      this.client = connectionInput;
      return;
    }

    if (isClientWrapper(connectionInput)) {
      this.ownClient = connectionInput.manageClient ?? false;
      this.lazyConnect = connectionInput.lazyConnect ?? false;
      this.client = connectionInput.client;
      return;
    }

    this.ownClient = true;
    this.lazyConnect = false;
  }

  /**
   * Returns a connected client, creating the owned client on first use and
   * reconnecting it when it was closed since the last call.
   */
  async getClient(): Promise<RedisClientLike> {
    if (this.client && (this.lazyConnect || isClientReady(this.client) || !this.client.connect)) {
      return this.client;
    }

    if (!this.connecting) {
      this.connecting = this.openClient().finally(() => {
        this.connecting = null;
      });
    }

    this.client = await this.connecting;
    return this.client;
  }

  async close(): Promise<void> {
    const client = this.client;
    if (!this.ownClient || !client) {
      return;
    }
    this.client = null;

    if (typeof client.quit === "function") {
      await client.quit();
      return;
    }

    if (typeof client.disconnect === "function") {
      await client.disconnect();
    }
  }

  private async openClient(): Promise<RedisClientLike> {
    const client = this.client ?? (await this.createOwnedClient());
    await this.connectWithRetry(client);
    return client;
  }

  private async createOwnedClient(): Promise<RedisClientLike> {
    const connection = this.connectionInput;
    if (isRedisClientLike(connection) || isClientWrapper(connection)) {
      throw new SessionError("INTERNAL_ERROR", "Redis client is missing.");
    }
    return createNodeRedisClient(connection, this.logger);
  }

  private async connectWithRetry(client: RedisClientLike): Promise<void> {
    const connect = client.connect?.bind(client);
    if (!connect) {
      return;
    }

    for (let attempt = 1; ; attempt++) {
      try {
        await connect();
        return;
      } catch (error) {
        if (attempt >= this.connectAttempts) {
          throw toRedisError(error, "connect", { attempts: attempt });
        }
        this.logger?.warn("Redis connect failed; retrying.", { attempt, error });
        await sleep(this.connectRetryDelayMs);
      }
    }
  }
}

/**
 * Redis TTLs are whole seconds and must be positive.
 */
export function normalizeTtl(ttlSeconds: number): number {
  const ttl = Math.floor(ttlSeconds);
  if (!Number.isFinite(ttl) || ttl <= 0) {
    throw new SessionError("INTERNAL_ERROR", "ttlSeconds must be a positive integer.", undefined, { ttlSeconds });
  }
  return ttl;
}

export async function setWithTtl(
  client: RedisClientLike,
  key: string,
  value: string,
  ttlSeconds: number | null,
): Promise<void> {
  if (ttlSeconds === null) {
    await client.set(key, value);
    return;
  }

  const ttl = normalizeTtl(ttlSeconds);
  if (typeof client.setEx === "function") {
    await client.setEx(key, ttl, value);
    return;
  }

  if (typeof client.setex === "function") {
    await client.setex(key, ttl, value);
    return;
  }

  throw new SessionError("INTERNAL_ERROR", "Redis client supports neither setEx nor setex.");
}

/**
 * Remaining key lifetime in milliseconds: `null` for keys without expiry,
 * `0` for missing keys.
 */
export async function remainingTtlMs(client: RedisClientLike, key: string): Promise<number | null> {
  let reply: number;
  if (typeof client.pTTL === "function") {
    reply = await client.pTTL(key);
  } else if (typeof client.pttl === "function") {
    reply = await client.pttl(key);
  } else {
    throw new SessionError("INTERNAL_ERROR", "Redis client supports neither pTTL nor pttl.");
  }

  // -1: no expiry, -2: no such key
  if (reply === -1) {
    return null;
  }
  return Math.max(0, reply);
}

/** node-redis replies booleans, ioredis replies 0/1. */
export function isAffirmativeReply(reply: number | boolean): boolean {
  return reply === true || reply === 1;
}

export function isRedisClientLike(value: unknown): value is RedisClientLike {
  if (!value || typeof value !== "object") {
    return false;
  }

  return (
    "get" in value &&
    typeof value.get === "function" &&
    "set" in value &&
    typeof value.set === "function" &&
    "del" in value &&
    typeof value.del === "function"
  );
}

export function isClientWrapper(value: unknown): value is RedisClientWrapper {
  if (!value || typeof value !== "object") {
    return false;
  }

  return "client" in value && isRedisClientLike(value.client);
}

async function createNodeRedisClient(params: RedisConnectionParams, logger: Logger | undefined): Promise<RedisClientLike> {
  const { createClient } = await import("redis");

  const socket = {
    ...(params.host !== undefined ? { host: params.host } : {}),
    ...(params.port !== undefined ? { port: params.port } : {}),
    // reconnects go through connectWithRetry on the next command
    reconnectStrategy: false as const,
  };

  const client = createClient({
    ...(params.url !== undefined ? { url: params.url } : {}),
    socket: params.tls ? { ...socket, tls: true as const } : socket,
    ...(params.username !== undefined ? { username: params.username } : {}),
    ...(params.password !== undefined ? { password: params.password } : {}),
    ...(params.database !== undefined ? { database: params.database } : {}),
  });

  client.on("error", (error: unknown) => {
    logger?.warn("Redis client error.", { error });
  });

  return {
    get: (key) => client.get(key),
    set: (key, value) => client.set(key, value),
    setEx: (key, ttlSeconds, value) => client.setEx(key, ttlSeconds, value),
    del: (key) => client.del(key),
    expire: (key, ttlSeconds) => client.expire(key, ttlSeconds),
    persist: (key) => client.persist(key),
    exists: (key) => client.exists(key),
    pTTL: (key) => client.pTTL(key),
    connect: async () => {
      await client.connect();
    },
    quit: async () => {
      await client.quit();
    },
    get isOpen() {
      return client.isOpen;
    },
  };
}

function isClientReady(client: RedisClientLike): boolean {
  if (client.isOpen === true) {
    return true;
  }

  if (typeof client.status === "string") {
    return client.status === "ready" || client.status === "connect" || client.status === "connecting";
  }

  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
