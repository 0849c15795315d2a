import {
  SCAN_START_CURSOR,
  SessionSyncError,
  type KeyValueBackend,
  type Logger,
  type ScanOptions,
  type ScanPage,
  type SetCondition,
} from "@sessionsync/core";
import {
  command,
  evalScript,
  isNodeRedis,
  normalizeTtl,
  RedisClientManager,
  setWithTtl,
  toInteger,
  toNullableString,
  toScanReply,
  toStringList,
  withTimeout,
  type RedisClientLike,
  type RedisConnectionInput,
  type RedisConnectionParams,
} from "./internal/redisClient";
import { isUnknownCommandError, toBackendError } from "./internal/errors";
import { APPEND_TO_SET, DELETE_IF_EMPTY, POP_ONCE, REMOVE_IF_ABSENT } from "./lua";

/**
 * Configuration for {@link RedisKeyValueBackend}.
 */
export type RedisKeyValueBackendOptions = {
  /** Upper bound for a single command, connect included. Default 2000. */
  commandTimeoutMs?: number;
  /** Lifetime of the claim marker used by the non-atomic pop fallback. Default 30. */
  claimTtlSeconds?: number;
  logger?: Logger;
};

type PopStrategy = "getdel" | "eval" | "claim";

const DEFAULT_COMMAND_TIMEOUT_MS = 2000;
const DEFAULT_CLAIM_TTL_SECONDS = 30;
const DEFAULT_SCAN_COUNT = 100;

/**
 * Redis implementation of {@link KeyValueBackend}. Per-user indices are sorted
 * sets scored by issue time, bumped past the highest score so ties keep arrival
 * order; appends and guarded removals run as Lua scripts.
 *
 * Every command is bounded by `commandTimeoutMs`, and connection failures or
 * timeouts reject with `BACKEND_UNAVAILABLE`.
 */
export class RedisKeyValueBackend implements KeyValueBackend {
  private readonly clientManager: RedisClientManager;
  private readonly commandTimeoutMs: number;
  private readonly claimTtlSeconds: number;
  private popStrategy: PopStrategy | null = null;

  constructor(
    connection: RedisConnectionInput,
    private readonly opts: RedisKeyValueBackendOptions = {},
  ) {
    this.clientManager = new RedisClientManager(connection, (error) =>
      opts.logger?.warn("Redis connection error.", { error: error instanceof Error ? error.message : String(error) }),
    );
    this.commandTimeoutMs = opts.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.claimTtlSeconds = opts.claimTtlSeconds ?? DEFAULT_CLAIM_TTL_SECONDS;
  }

  async get(key: string): Promise<string | null> {
    return this.run("GET", key, async (client) => toNullableString(await client.get(key)));
  }

  async setWithTtl(key: string, value: string, ttlSeconds: number, condition?: SetCondition): Promise<boolean> {
    const ttl = normalizeTtl(ttlSeconds);
    return this.run("SET", key, (client) => setWithTtl(client, key, value, ttl, condition));
  }

  async delete(key: string): Promise<boolean> {
    return this.run("DEL", key, async (client) => toInteger(await client.del(key)) > 0);
  }

  async exists(key: string): Promise<boolean> {
    return this.run("EXISTS", key, async (client) => toInteger(await command(client, "exists", "exists")(key)) > 0);
  }

  async addToSet(setKey: string, member: string, score: number): Promise<void> {
    await this.run("ZADD", setKey, async (client) => {
      const zadd = command(client, "zAdd", "zadd");
      await (isNodeRedis(client) ? zadd(setKey, { score, value: member }) : zadd(setKey, score, member));
    });
  }

  async appendToSet(setKey: string, member: string, minScore: number): Promise<number> {
    return this.run("EVAL", setKey, async (client) => {
      const score = Number(
        toNullableString(await evalScript(client, APPEND_TO_SET, [setKey], [member, String(minScore)])),
      );
      if (!Number.isFinite(score)) {
        throw new SessionSyncError("INTERNAL_ERROR", "Unexpected score from append script.", undefined, { setKey });
      }
      return score;
    });
  }

  async removeFromSet(setKey: string, members: readonly string[]): Promise<number> {
    if (members.length === 0) {
      return 0;
    }

    return this.run("ZREM", setKey, async (client) => {
      const zrem = command(client, "zRem", "zrem");
      return toInteger(await (isNodeRedis(client) ? zrem(setKey, [...members]) : zrem(setKey, ...members)));
    });
  }

  async membersOf(setKey: string): Promise<string[]> {
    return this.run("ZRANGE", setKey, async (client) =>
      toStringList(await command(client, "zRange", "zrange")(setKey, 0, -1)),
    );
  }

  async setCardinality(setKey: string): Promise<number> {
    return this.run("ZCARD", setKey, async (client) => toInteger(await command(client, "zCard", "zcard")(setKey)));
  }

  async removeFromSetIfAbsent(setKey: string, member: string, guardKey: string): Promise<boolean> {
    return this.run("EVAL", setKey, async (client) => {
      const removed = await evalScript(client, REMOVE_IF_ABSENT, [setKey, guardKey], [member]);
      return toInteger(removed) > 0;
    });
  }

  async deleteSetIfEmpty(setKey: string): Promise<boolean> {
    return this.run("EVAL", setKey, async (client) => {
      const deleted = await evalScript(client, DELETE_IF_EMPTY, [setKey], []);
      return toInteger(deleted) === 1;
    });
  }

  async scanKeys(pattern: string, options?: ScanOptions): Promise<ScanPage> {
    const cursor = options?.cursor ?? SCAN_START_CURSOR;
    const count = options?.count ?? DEFAULT_SCAN_COUNT;

    return this.run("SCAN", pattern, async (client) => {
      const scan = command(client, "scan", "scan");
      // node-redis v4 takes the cursor as a number; cursors past 2^53 lose precision there.
      const reply = isNodeRedis(client)
        ? await scan(Number(cursor), { MATCH: pattern, COUNT: count })
        : await scan(cursor, "MATCH", pattern, "COUNT", count);
      return toScanReply(reply);
    });
  }

  /**
   * Pops through `GETDEL` (Redis 6.2+), else a Lua script. A client that
   * supports neither gets a claim marker (`SET <key>:claim NX`) before a plain
   * GET and DEL: concurrent callers are serialized by the marker, but a value
   * rewritten between the GET and the DEL is lost.
   */
  async atomicCheckAndDelete(key: string): Promise<string | null> {
    return this.run("GETDEL", key, async (client) => {
      const strategy = this.popStrategy ?? this.detectPopStrategy(client);

      if (strategy === "getdel") {
        try {
          return toNullableString(await command(client, "getDel", "getdel")(key));
        } catch (error) {
          if (!isUnknownCommandError(error)) throw error;
          this.popStrategy = this.fallbackAfterGetDel(client);
          return this.popWith(client, key, this.popStrategy);
        }
      }

      return this.popWith(client, key, strategy);
    });
  }

  async close(): Promise<void> {
    await this.clientManager.close();
  }

  /**
   * Exposes the client manager so a lock provider can share the connection.
   */
  getClientManager(): RedisClientManager {
    return this.clientManager;
  }

  private async popWith(client: RedisClientLike, key: string, strategy: PopStrategy): Promise<string | null> {
    if (strategy === "eval") {
      return toNullableString(await evalScript(client, POP_ONCE, [key], []));
    }

    if (strategy === "claim") {
      const claimed = await setWithTtl(client, `${key}:claim`, "1", this.claimTtlSeconds, "NX");
      if (!claimed) {
        return null;
      }
      const value = toNullableString(await client.get(key));
      await client.del(key);
      return value;
    }

    return toNullableString(await command(client, "getDel", "getdel")(key));
  }

  private detectPopStrategy(client: RedisClientLike): PopStrategy {
    if (typeof client.getDel === "function" || typeof client.getdel === "function") {
      this.popStrategy = "getdel";
      return "getdel";
    }
    this.popStrategy = this.fallbackAfterGetDel(client);
    return this.popStrategy;
  }

  private fallbackAfterGetDel(client: RedisClientLike): PopStrategy {
    if (typeof client.eval === "function") {
      return "eval";
    }
    this.opts.logger?.warn("Redis client supports neither GETDEL nor EVAL; state pops use a claim marker.");
    return "claim";
  }

  private async run<T>(op: string, key: string, fn: (client: RedisClientLike) => Promise<T>): Promise<T> {
    try {
      return await withTimeout(
        op,
        this.commandTimeoutMs,
        this.clientManager.getClient().then((client) => fn(client)),
      );
    } catch (error) {
      const wrapped = toBackendError(error, { op, key });
      if (wrapped.code === "BACKEND_UNAVAILABLE") {
        this.opts.logger?.warn("Redis command failed: backend unavailable.", { op, key, error: wrapped.details?.reason });
      }
      throw wrapped;
    }
  }
}

export type { RedisClientLike, RedisConnectionInput, RedisConnectionParams };
