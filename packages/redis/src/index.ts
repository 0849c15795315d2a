export {
  RedisKeyValueBackend,
  type RedisClientLike,
  type RedisConnectionInput,
  type RedisConnectionParams,
  type RedisKeyValueBackendOptions,
} from "./RedisKeyValueBackend";

export {
  RedisLockProvider,
  type RedisLockProviderInput,
  type RedisLockProviderOptions,
} from "./RedisLockProvider";

export { classifyRedisError, RedisCommandTimeoutError } from "./internal/errors";
export { APPEND_TO_SET, DELETE_IF_EMPTY, POP_ONCE, RELEASE_LOCK, REMOVE_IF_ABSENT } from "./lua";
