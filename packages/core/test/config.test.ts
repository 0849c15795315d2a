import { describe, expect, it } from "vitest";
import { loadSessionSyncConfig, SessionSyncError } from "../src";

describe("loadSessionSyncConfig", () => {
  it("applies_defaults_for_empty_environment", () => {
    expect(loadSessionSyncConfig({})).toEqual({
      backendAddress: null,
      backendTimeoutMs: 2000,
      keyPrefix: "appauth",
      maxSessionsPerUser: 5,
      sessionListLimit: 20,
      ttl: {
        slidingEnabled: true,
        slidingSeconds: 3600,
        absoluteSeconds: 0,
        minSeconds: 60,
        defaultTtlSeconds: 3600,
      },
      stateTtlSeconds: 600,
      cleanup: { includeExpired: false, maxAgeDays: 30, batchSize: 100, intervalSeconds: 3600 },
      cookie: { name: "app_session", secure: false, domain: undefined },
      logLevel: "info",
    });
  });

  it("reads_overrides", () => {
    const config = loadSessionSyncConfig({
      REDIS_URI: "redis://cache:6379/0",
      REDIS_PREFIX: "myapp",
      MAX_USER_SESSIONS: "0",
      SESSION_SLIDING: "false",
      SESSION_ABSOLUTE_SECONDS: "86400",
      CLEANUP_INCLUDE_EXPIRED: "yes",
      CLEANUP_MAX_AGE_DAYS: "7",
      APP_ENV: "production",
      LOG_LEVEL: "debug",
    });

    expect(config.backendAddress).toBe("redis://cache:6379/0");
    expect(config.keyPrefix).toBe("myapp");
    expect(config.maxSessionsPerUser).toBe(0);
    expect(config.ttl.slidingEnabled).toBe(false);
    expect(config.ttl.absoluteSeconds).toBe(86400);
    expect(config.cleanup.includeExpired).toBe(true);
    expect(config.cleanup.maxAgeDays).toBe(7);
    expect(config.cookie.secure).toBe(true);
    expect(config.logLevel).toBe("debug");
  });

  it("prefers_REDIS_URL_over_REDIS_URI", () => {
    const config = loadSessionSyncConfig({ REDIS_URL: "redis://a:6379", REDIS_URI: "redis://b:6379" });
    expect(config.backendAddress).toBe("redis://a:6379");
  });

  it("rejects_invalid_values", () => {
    let error: unknown;
    try {
      loadSessionSyncConfig({ REDIS_PREFIX: "bad*prefix", MAX_USER_SESSIONS: "-1" });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(SessionSyncError);
    expect(error).toMatchObject({ code: "INVALID_CONFIG" });
    expect(error).toMatchObject({
      details: {
        issues: ["REDIS_PREFIX: must not contain glob characters", "MAX_USER_SESSIONS: Number must be greater than or equal to 0"],
      },
    });
  });

  it("returns_frozen_config", () => {
    const config = loadSessionSyncConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.ttl)).toBe(true);
  });
});
