import { SessionSyncError } from "@sessionsync/core";
import { RedisCommandTimeoutError } from "./errors";

type Command = (...args: unknown[]) => Promise<unknown>;

/**
 * Structural view over node-redis (camelCase commands) and ioredis (lowercase
 * commands). Only `get`, `set` and `del` are required; every other command is
 * looked up under both spellings.
 */
export interface RedisClientLike {
  get(key: string): Promise<string | null>;
  set(...args: unknown[]): Promise<unknown>;
  del(...args: unknown[]): Promise<unknown>;
  exists?: Command;
  expire?: Command;
  setEx?: Command;
  setex?: Command;
  getDel?: Command;
  getdel?: Command;
  zAdd?: Command;
  zadd?: Command;
  zRem?: Command;
  zrem?: Command;
  zRange?: Command;
  zrange?: Command;
  zCard?: Command;
  zcard?: Command;
  scan?: Command;
  eval?: Command;
  on?(event: string, listener: (error: unknown) => void): unknown;
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
  connectTimeoutMs?: number;
  lazyConnect?: boolean;
  redisOptions?: Record<string, unknown>;
};

export type RedisClientWrapper = {
  client: RedisClientLike;
  manageClient?: boolean;
  lazyConnect?: boolean;
};

export type RedisConnectionInput = RedisClientLike | RedisClientWrapper | RedisConnectionParams;

export type CommandName =
  | "exists"
  | "expire"
  | "setEx"
  | "setex"
  | "getDel"
  | "getdel"
  | "zAdd"
  | "zadd"
  | "zRem"
  | "zrem"
  | "zRange"
  | "zrange"
  | "zCard"
  | "zcard"
  | "scan"
  | "eval";

type CreateClient = (options?: Record<string, unknown>) => RedisClientLike;

/**
 * Resolves a connection input to a connected client, creating one through the
 * `redis` package when only connection parameters were given.
 */
export class RedisClientManager {
  private readonly ownClient: boolean;
  private readonly connectionInput: RedisConnectionInput;
  private client: RedisClientLike | null = null;
  private clientInitPromise: Promise<RedisClientLike> | null = null;

  /**
   * @param onError receives connection errors emitted by clients this manager creates
   */
  constructor(
    connection: RedisConnectionInput,
    private readonly onError?: (error: unknown) => void,
  ) {
    this.connectionInput = connection;

    if (isRedisClientLike(connection)) {
      this.ownClient = false;
      this.client = connection;
      return;
    }

    if (isClientWrapper(connection)) {
      this.ownClient = connection.manageClient ?? false;
      this.client = connection.client;
      return;
    }

    this.ownClient = true;
  }

  async getClient(): Promise<RedisClientLike> {
    if (this.client) {
      await ensureConnected(this.client, this.connectionInput);
      return this.client;
    }

    if (!this.clientInitPromise) {
      this.clientInitPromise = this.createOwnedClient();
      // a failed connect is retried on the next call
      this.clientInitPromise.catch(() => {
        this.clientInitPromise = null;
      });
    }

    this.client = await this.clientInitPromise;
    return this.client;
  }

  async close(): Promise<void> {
    if (!this.ownClient || !this.client) {
      return;
    }

    const client = this.client;
    this.client = null;
    this.clientInitPromise = null;

    if (typeof client.quit === "function") {
      await client.quit();
      return;
    }

    if (typeof client.disconnect === "function") {
      await client.disconnect();
    }
  }

  private async createOwnedClient(): Promise<RedisClientLike> {
    const connection = this.connectionInput;
    if (isRedisClientLike(connection) || isClientWrapper(connection)) {
      const client = isClientWrapper(connection) ? connection.client : connection;
      await ensureConnected(client, connection);
      return client;
    }

    const redisModule: { createClient?: unknown } = await import("redis");
    const createClientFn = redisModule.createClient;

    if (typeof createClientFn !== "function") {
      throw new SessionSyncError(
        "INVALID_CONFIG",
        "redis.createClient is not available. Ensure the 'redis' package is installed.",
      );
    }

    const client: unknown = (createClientFn as CreateClient)(buildNodeRedisOptions(connection));
    if (!isRedisClientLike(client)) {
      throw new SessionSyncError("INVALID_CONFIG", "redis.createClient returned an unusable client.");
    }

    // node-redis emits "error" on every failed reconnect; an unhandled one would crash the process
    client.on?.("error", (error) => this.onError?.(error));

    await ensureConnected(client, connection);
    return client;
  }
}

export function normalizeTtl(ttlSeconds: number): number {
  const ttl = Math.floor(ttlSeconds);
  if (!Number.isFinite(ttl) || ttl <= 0) {
    throw new SessionSyncError("INVALID_REQUEST", "ttlSeconds must be a positive integer.", undefined, {
      ttlSeconds,
    });
  }
  return ttl;
}

/**
 * Races a command against a timer. The command itself is not cancelled.
 */
export async function withTimeout<T>(command: string, timeoutMs: number, work: Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new RedisCommandTimeoutError(command, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * `SET key value EX ttl [NX|XX]`, resolving whether the value was written.
 */
export async function setWithTtl(
  client: RedisClientLike,
  key: string,
  value: string,
  ttlSeconds: number,
  condition?: "NX" | "XX",
): Promise<boolean> {
  if (!condition) {
    if (typeof client.setEx === "function") {
      await client.setEx(key, ttlSeconds, value);
      return true;
    }

    if (typeof client.setex === "function") {
      await client.setex(key, ttlSeconds, value);
      return true;
    }
  }

  if (isNodeRedis(client)) {
    const options: Record<string, unknown> = { EX: ttlSeconds };
    if (condition) options[condition] = true;
    return isOk(await client.set(key, value, options));
  }

  const args: unknown[] = [key, value, "EX", ttlSeconds];
  if (condition) args.push(condition);
  return isOk(await client.set(...args));
}

export async function evalScript(
  client: RedisClientLike,
  script: string,
  keys: readonly string[],
  args: readonly string[],
): Promise<unknown> {
  if (typeof client.eval !== "function") {
    throw new SessionSyncError("INTERNAL_ERROR", "Redis client does not support EVAL.");
  }

  if (isNodeRedis(client)) {
    return client.eval(script, { keys: [...keys], arguments: [...args] });
  }
  return client.eval(script, keys.length, ...keys, ...args);
}

export async function releaseLockIfOwned(
  client: RedisClientLike,
  key: string,
  token: string,
  script: string,
): Promise<void> {
  if (typeof client.eval === "function") {
    await evalScript(client, script, [key], [token]);
    return;
  }

  const current = await client.get(key);
  if (current === token) {
    await client.del(key);
  }
}

/**
 * node-redis v4 exposes camelCase commands and takes option objects; ioredis
 * uses lowercase names and positional arguments.
 */
export function isNodeRedis(client: RedisClientLike): boolean {
  return typeof client.zAdd === "function";
}

export function command(client: RedisClientLike, camel: CommandName, lower: CommandName): Command {
  const fn = client[camel] ?? client[lower];
  if (!fn) {
    throw new SessionSyncError("INTERNAL_ERROR", `Redis client does not support ${lower.toUpperCase()}.`);
  }
  return fn.bind(client);
}

export function isOk(result: unknown): boolean {
  return result === "OK" || result === true;
}

export function toInteger(result: unknown): number {
  if (typeof result === "number") return result;
  if (typeof result === "string" && result.trim() !== "") return Number(result);
  return 0;
}

export function toNullableString(result: unknown): string | null {
  if (result === null || result === undefined) return null;
  if (typeof result === "string") return result;
  if (Buffer.isBuffer(result)) return result.toString("utf8");
  throw unexpectedReply(result);
}

export function toStringList(result: unknown): string[] {
  if (!Array.isArray(result)) {
    throw unexpectedReply(result);
  }
  return result.map((item) => toNullableString(item) ?? "");
}

/**
 * Normalizes a SCAN reply: node-redis v4 resolves `{ cursor, keys }`, ioredis
 * resolves `[cursor, keys]`.
 */
export function toScanReply(result: unknown): { cursor: string; keys: string[] } {
  if (Array.isArray(result) && result.length === 2) {
    return { cursor: String(result[0]), keys: toStringList(result[1]) };
  }

  if (result && typeof result === "object" && "cursor" in result && "keys" in result) {
    return { cursor: String(result.cursor), keys: toStringList(result.keys) };
  }

  throw unexpectedReply(result);
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
  if (!value || typeof value !== "object" || !("client" in value)) {
    return false;
  }
  return isRedisClientLike(value.client);
}

function unexpectedReply(result: unknown): SessionSyncError {
  return new SessionSyncError("INTERNAL_ERROR", "Unexpected Redis reply.", undefined, {
    replyType: Array.isArray(result) ? "array" : typeof result,
  });
}

function buildNodeRedisOptions(connection: RedisConnectionParams): Record<string, unknown> {
  const socket: Record<string, unknown> = {};

  if (connection.host) {
    socket.host = connection.host;
  }

  if (connection.port !== undefined) {
    socket.port = connection.port;
  }

  if (connection.tls) {
    socket.tls = true;
  }

  if (connection.connectTimeoutMs !== undefined) {
    socket.connectTimeout = connection.connectTimeoutMs;
  }

  const options: Record<string, unknown> = {
    ...(connection.redisOptions ?? {}),
  };

  if (connection.url) {
    options.url = connection.url;
  }

  if (Object.keys(socket).length > 0) {
    const base = options.socket;
    options.socket = {
      ...(base && typeof base === "object" ? base : {}),
      ...socket,
    };
  }

  if (connection.username) {
    options.username = connection.username;
  }

  if (connection.password) {
    options.password = connection.password;
  }

  if (connection.database !== undefined) {
    options.database = connection.database;
  }

  return options;
}

async function ensureConnected(client: RedisClientLike, input: RedisConnectionInput): Promise<void> {
  if (isClientReady(client)) {
    return;
  }

  const lazyConnect = isClientWrapper(input)
    ? (input.lazyConnect ?? false)
    : isRedisClientLike(input)
      ? false
      : (input.lazyConnect ?? false);

  if (lazyConnect) {
    return;
  }

  if (typeof client.connect === "function") {
    await client.connect();
  }
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
