export {
  RedisSessionStore,
  createRedisSessionStore,
  type CreateRedisSessionStoreOptions,
  type RedisSessionStoreOptions,
} from "./RedisSessionStore";

export {
  RedisClientManager,
  type RedisClientLike,
  type RedisClientWrapper,
  type RedisConnectionInput,
  type RedisConnectionParams,
} from "./internal/redisClient";

export { classifyRedisError } from "./internal/redisErrors";
