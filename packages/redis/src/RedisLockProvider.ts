import { randomUUID } from "node:crypto";
import { KeyLayout, SessionSyncError, type LockProvider } from "@sessionsync/core";
import {
  RedisClientManager,
  type RedisClientLike,
  type RedisConnectionInput,
  normalizeTtl,
  releaseLockIfOwned,
  setWithTtl,
} from "./internal/redisClient";
import { toBackendError } from "./internal/errors";
import { RELEASE_LOCK } from "./lua";
import type { RedisKeyValueBackend } from "./RedisKeyValueBackend";

export type RedisLockProviderOptions = {
  /** Lock keys are `<prefix>:lock:<name>`. */
  keys?: KeyLayout;
  acquireTimeoutMs?: number;
  retryDelayMs?: number;
};

export type RedisLockProviderInput =
  | RedisConnectionInput
  | {
      backend: RedisKeyValueBackend;
    };

const DEFAULT_ACQUIRE_TIMEOUT_MS = 5000;
const DEFAULT_RETRY_DELAY_MS = 50;

/**
 * `SET NX EX` lock with token-checked release. Used around per-user index
 * mutations such as capacity eviction.
 */
export class RedisLockProvider implements LockProvider {
  private readonly keys: KeyLayout;
  private readonly acquireTimeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly clientManager: RedisClientManager;
  private readonly ownsClientManager: boolean;

  constructor(input: RedisLockProviderInput, options?: RedisLockProviderOptions) {
    if (isBackendInput(input)) {
      this.clientManager = input.backend.getClientManager();
      this.ownsClientManager = false;
    } else {
      this.clientManager = new RedisClientManager(input);
      this.ownsClientManager = true;
    }
    this.keys = options?.keys ?? new KeyLayout();
    this.acquireTimeoutMs = options?.acquireTimeoutMs ?? DEFAULT_ACQUIRE_TIMEOUT_MS;
    this.retryDelayMs = options?.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  }

  async withLock<T>(name: string, ttlSeconds: number, fn: () => Promise<T>): Promise<T> {
    const ttl = normalizeTtl(ttlSeconds);
    const lockKey = this.keys.lock(name);
    const token = randomUUID();
    let client: RedisClientLike;
    try {
      client = await this.clientManager.getClient();
    } catch (error) {
      throw toBackendError(error, { lockKey, phase: "connect" });
    }

    let acquired: boolean;
    try {
      acquired = await this.acquireLock(client, lockKey, token, ttl);
    } catch (error) {
      throw toBackendError(error, { lockKey, phase: "acquire" });
    }

    if (!acquired) {
      throw new SessionSyncError("LOCK_TIMEOUT", "Failed to acquire lock within timeout.", undefined, {
        lockKey,
        ttlSeconds: ttl,
        acquireTimeoutMs: this.acquireTimeoutMs,
      });
    }

    let fnError: unknown = null;
    try {
      return await fn();
    } catch (error) {
      fnError = error;
      throw error;
    } finally {
      try {
        await releaseLockIfOwned(client, lockKey, token, RELEASE_LOCK);
      } catch (error) {
        // the lock expires on its own; only surface the failure when fn succeeded
        if (!fnError) {
          throw toBackendError(error, { lockKey, phase: "release" });
        }
      }
    }
  }

  async close(): Promise<void> {
    if (!this.ownsClientManager) {
      return;
    }
    await this.clientManager.close();
  }

  private async acquireLock(
    client: RedisClientLike,
    lockKey: string,
    token: string,
    ttlSeconds: number,
  ): Promise<boolean> {
    const deadline = Date.now() + this.acquireTimeoutMs;

    while (Date.now() <= deadline) {
      if (await setWithTtl(client, lockKey, token, ttlSeconds, "NX")) {
        return true;
      }

      await sleep(this.retryDelayMs);
    }

    return false;
  }
}

function isBackendInput(input: RedisLockProviderInput): input is { backend: RedisKeyValueBackend } {
  return typeof input === "object" && input !== null && "backend" in input;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
