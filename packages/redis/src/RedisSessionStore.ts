import {
  CachedSessionStore,
  DEFAULT_KEY_PREFIX,
  LruSessionCache,
  type Logger,
  type SessionConfig,
  type SessionStore,
} from "@kvsession/core";
import {
  RedisClientManager,
  type RedisClientLike,
  type RedisConnectionInput,
  type RedisConnectionParams,
  isAffirmativeReply,
  remainingTtlMs,
  setWithTtl,
} from "./internal/redisClient";
import { type RedisOperation, toRedisError } from "./internal/redisErrors";

/**
 * Configuration for {@link RedisSessionStore}.
 */
export type RedisSessionStoreOptions = {
  keyPrefix?: string;
  connectAttempts?: number;
  connectRetryDelayMs?: number;
  logger?: Logger;
};

/**
 * Redis-backed `SessionStore`. Payloads are stored as plain strings under
 * `keyPrefix + sessionId` and expire through Redis' own key TTL.
 */
export class RedisSessionStore implements SessionStore {
  private readonly keyPrefix: string;
  private readonly clientManager: RedisClientManager;

  constructor(connection: RedisConnectionInput, options?: RedisSessionStoreOptions) {
    this.clientManager = new RedisClientManager(connection, {
      ...(options?.connectAttempts !== undefined ? { connectAttempts: options.connectAttempts } : {}),
      ...(options?.connectRetryDelayMs !== undefined ? { connectRetryDelayMs: options.connectRetryDelayMs } : {}),
      ...(options?.logger ? { logger: options.logger } : {}),
    });
    this.keyPrefix = options?.keyPrefix ?? DEFAULT_KEY_PREFIX;
  }

  async load(sessionId: string): Promise<string | null> {
    return this.run("load", sessionId, (client, key) => client.get(key));
  }

  async save(sessionId: string, raw: string, ttlSeconds: number | null): Promise<void> {
    await this.run("save", sessionId, (client, key) => setWithTtl(client, key, raw, ttlSeconds));
  }

  async delete(sessionId: string): Promise<void> {
    await this.run("delete", sessionId, (client, key) => client.del(key));
  }

  async touch(sessionId: string, ttlSeconds: number | null): Promise<boolean> {
    return this.run("touch", sessionId, async (client, key) => {
      if (ttlSeconds !== null) {
        return isAffirmativeReply(await client.expire(key, Math.max(1, Math.floor(ttlSeconds))));
      }

      // PERSIST replies 0 for keys that exist without a TTL
      if ((await client.exists(key)) === 0) {
        return false;
      }
      await client.persist(key);
      return true;
    });
  }

  async has(sessionId: string): Promise<boolean> {
    return this.run("has", sessionId, async (client, key) => (await client.exists(key)) > 0);
  }

  async ttlMs(sessionId: string): Promise<number | null> {
    return this.run("ttl", sessionId, (client, key) => remainingTtlMs(client, key));
  }

  async close(): Promise<void> {
    await this.clientManager.close();
  }

  private makeKey(sessionId: string): string {
    return `${this.keyPrefix}${sessionId}`;
  }

  private async run<T>(
    operation: RedisOperation,
    sessionId: string,
    fn: (client: RedisClientLike, key: string) => Promise<T>,
  ): Promise<T> {
    try {
      const client = await this.clientManager.getClient();
      return await fn(client, this.makeKey(sessionId));
    } catch (error) {
      throw toRedisError(error, operation, { sessionId });
    }
  }
}

export type CreateRedisSessionStoreOptions = {
  /** Use this client instead of creating one from `config.backend`. */
  client?: RedisClientLike;
  logger?: Logger;
};

/**
 * Builds the backend described by `config.backend`, wrapped in a
 * read-through cache when `config.cache.enabled` is set.
 */
export function createRedisSessionStore(config: SessionConfig, options?: CreateRedisSessionStoreOptions): SessionStore {
  const backend = config.backend;
  const params: RedisConnectionParams = {
    ...(backend.url !== undefined ? { url: backend.url } : {}),
    host: backend.host,
    port: backend.port,
    database: backend.database,
    tls: backend.tls,
    ...(backend.username !== undefined ? { username: backend.username } : {}),
    ...(backend.password !== undefined ? { password: backend.password } : {}),
  };

  const store = new RedisSessionStore(options?.client ?? params, {
    keyPrefix: backend.keyPrefix,
    connectAttempts: backend.connectAttempts,
    connectRetryDelayMs: backend.connectRetryDelayMs,
    ...(options?.logger ? { logger: options.logger } : {}),
  });

  if (!config.cache.enabled) {
    return store;
  }

  return new CachedSessionStore(store, {
    cache: new LruSessionCache({ maxEntries: config.cache.maxEntries }),
    ttlSeconds: config.cache.ttlSeconds,
    ...(options?.logger ? { logger: options.logger } : {}),
  });
}
