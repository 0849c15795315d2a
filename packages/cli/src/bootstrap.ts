import {
  createSessionSync,
  KeyLayout,
  SessionSyncError,
  type KeyValueBackend,
  type LockProvider,
  type Logger,
  type SessionManager,
  type SessionSyncConfig,
  type SweepEngine,
} from "@sessionsync/core";
import { RedisKeyValueBackend, RedisLockProvider } from "@sessionsync/redis";

export type Runtime = {
  backend: KeyValueBackend;
  sessions: SessionManager<unknown>;
  engine: SweepEngine;
  close(): Promise<void>;
};

export type RuntimeOverrides = {
  /** Used instead of connecting to `REDIS_URL`; the caller keeps ownership. */
  backend?: KeyValueBackend;
  logger?: Logger;
};

/**
 * Connects to the configured backend and builds the stores the commands use.
 */
export function createRuntime(config: SessionSyncConfig, overrides: RuntimeOverrides = {}): Runtime {
  const logger = overrides.logger;

  let backend: KeyValueBackend;
  let lockProvider: LockProvider | undefined;
  let owned: RedisKeyValueBackend | null = null;

  if (overrides.backend) {
    backend = overrides.backend;
  } else {
    if (!config.backendAddress) {
      throw new SessionSyncError("INVALID_CONFIG", "REDIS_URL is not set.");
    }
    owned = new RedisKeyValueBackend(
      { url: config.backendAddress, connectTimeoutMs: config.backendTimeoutMs },
      { commandTimeoutMs: config.backendTimeoutMs, logger },
    );
    backend = owned;
    lockProvider = new RedisLockProvider({ backend: owned }, { keys: new KeyLayout(config.keyPrefix) });
  }

  const { sessions, engine } = createSessionSync<unknown>(config, { backend, lockProvider, logger });

  return {
    backend,
    sessions,
    engine,
    async close() {
      await owned?.close();
    },
  };
}
