import { describe, expect, it, vi } from "vitest";
import { KeyLayout, scanAll, SessionManager, SweepEngine, type Logger } from "@sessionsync/core";
import { APPEND_TO_SET, POP_ONCE, RedisKeyValueBackend, REMOVE_IF_ABSENT, type RedisClientLike } from "../src";
import { FakeNodeRedis } from "./fakeRedis";

function createLogger() {
  return {
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  };
}

describe("RedisKeyValueBackend", () => {
  it("supports string commands on an existing node-redis client", async () => {
    const fake = new FakeNodeRedis();
    const backend = new RedisKeyValueBackend(fake);

    expect(await backend.setWithTtl("k", "v1", 60, "XX")).toBe(false);
    expect(await backend.setWithTtl("k", "v1", 60, "NX")).toBe(true);
    expect(await backend.setWithTtl("k", "v2", 60, "NX")).toBe(false);
    expect(await backend.setWithTtl("k", "v3", 60)).toBe(true);
    expect(await backend.get("k")).toBe("v3");
    expect(await backend.exists("k")).toBe(true);
    expect(await backend.delete("k")).toBe(true);
    expect(await backend.delete("k")).toBe(false);

    await expect(backend.close()).resolves.toBeUndefined();
  });

  it("rejects non-positive ttl", async () => {
    const backend = new RedisKeyValueBackend(new FakeNodeRedis());
    await expect(backend.setWithTtl("k", "v", 0)).rejects.toMatchObject({ code: "INVALID_REQUEST" });
  });

  it("maps ordered-set operations to sorted-set commands", async () => {
    const fake = new FakeNodeRedis();
    const backend = new RedisKeyValueBackend(fake);

    await backend.addToSet("idx", "a", 20);
    await backend.addToSet("idx", "b", 10);
    await backend.addToSet("idx", "c", 30);

    expect(await backend.membersOf("idx")).toEqual(["b", "a", "c"]);
    expect(await backend.setCardinality("idx")).toBe(3);
    expect(await backend.removeFromSet("idx", ["a", "missing"])).toBe(1);
    expect(await backend.removeFromSet("idx", [])).toBe(0);
    expect(fake.zsets.get("idx")?.size).toBe(2);
  });

  it("appends index members in arrival order through a script", async () => {
    const fake = new FakeNodeRedis();
    const backend = new RedisKeyValueBackend(fake);

    expect(await backend.appendToSet("idx", "zz", 1_000)).toBe(1_000);
    expect(await backend.appendToSet("idx", "aa", 1_000)).toBe(1_001);
    expect(await backend.appendToSet("idx", "mm", 5_000)).toBe(5_000);

    expect(await backend.membersOf("idx")).toEqual(["zz", "aa", "mm"]);
    expect(fake.scripts).toEqual([APPEND_TO_SET, APPEND_TO_SET, APPEND_TO_SET]);
  });

  it("guarded removals run as scripts", async () => {
    const fake = new FakeNodeRedis();
    const backend = new RedisKeyValueBackend(fake);

    await backend.addToSet("idx", "s1", 1);
    await backend.setWithTtl("sess:s1", "{}", 60);

    expect(await backend.removeFromSetIfAbsent("idx", "s1", "sess:s1")).toBe(false);
    await backend.delete("sess:s1");
    expect(await backend.removeFromSetIfAbsent("idx", "s1", "sess:s1")).toBe(true);
    expect(await backend.deleteSetIfEmpty("idx")).toBe(true);
    expect(fake.scripts.filter((s) => s === REMOVE_IF_ABSENT)).toHaveLength(2);
  });

  it("scans page by page", async () => {
    const fake = new FakeNodeRedis();
    const backend = new RedisKeyValueBackend(fake);

    await backend.setWithTtl("p:sess:x", "{}", 60);
    await backend.addToSet("p:usess:a", "x", 1);
    await backend.addToSet("p:usess:b", "y", 1);
    await backend.addToSet("p:usess:c", "z", 1);

    const first = await backend.scanKeys("p:usess:*", { count: 2 });
    expect(first).toEqual({ cursor: "2", keys: ["p:usess:a"] });

    const found: string[] = [];
    for await (const page of scanAll(backend, "p:usess:*", { count: 2 })) {
      found.push(...page.keys);
    }
    expect(found).toEqual(["p:usess:a", "p:usess:b", "p:usess:c"]);
  });

  it("pops a value for exactly one concurrent caller", async () => {
    const fake = new FakeNodeRedis();
    const backend = new RedisKeyValueBackend(fake);
    await backend.setWithTtl("state:t", "payload", 60);

    const results = await Promise.all([
      backend.atomicCheckAndDelete("state:t"),
      backend.atomicCheckAndDelete("state:t"),
      backend.atomicCheckAndDelete("state:t"),
    ]);

    expect(results.filter((r) => r !== null)).toEqual(["payload"]);
    expect(fake.has("state:t")).toBe(false);
  });

  it("falls back to the pop script when GETDEL is unknown to the server", async () => {
    const fake = new FakeNodeRedis();
    fake.getDel = async () => {
      throw new Error("ERR unknown command 'GETDEL'");
    };
    const backend = new RedisKeyValueBackend(fake);
    await backend.setWithTtl("state:t", "payload", 60);

    expect(await backend.atomicCheckAndDelete("state:t")).toBe("payload");
    expect(await backend.atomicCheckAndDelete("state:t")).toBeNull();
    expect(fake.scripts.filter((s) => s === POP_ONCE)).toHaveLength(2);
  });

  it("uses a claim marker on clients without GETDEL and EVAL", async () => {
    const strings = new Map<string, string>();
    const client: RedisClientLike = {
      async get(key) {
        return strings.get(key) ?? null;
      },
      async set(...args) {
        const [key, value, , , condition] = args;
        if (condition === "NX" && strings.has(String(key))) return null;
        strings.set(String(key), String(value));
        return "OK";
      },
      async del(...args) {
        return strings.delete(String(args[0])) ? 1 : 0;
      },
    };
    const logger = createLogger();
    const backend = new RedisKeyValueBackend(client, { logger });
    strings.set("state:t", "payload");

    expect(await backend.atomicCheckAndDelete("state:t")).toBe("payload");
    expect(await backend.atomicCheckAndDelete("state:t")).toBeNull();
    expect(strings.has("state:t:claim")).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith(
      "Redis client supports neither GETDEL nor EVAL; state pops use a claim marker.",
    );
  });

  it("reports unreachable server as BACKEND_UNAVAILABLE", async () => {
    const fake = new FakeNodeRedis();
    vi.spyOn(fake, "get").mockRejectedValue(
      Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:6379"), { code: "ECONNREFUSED" }),
    );
    const logger = createLogger();
    const backend = new RedisKeyValueBackend(fake, { logger });

    await expect(backend.get("k")).rejects.toMatchObject({
      code: "BACKEND_UNAVAILABLE",
      details: { op: "GET", key: "k", redisCode: "ECONNREFUSED" },
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("bounds every command with the timeout", async () => {
    const fake = new FakeNodeRedis();
    vi.spyOn(fake, "get").mockReturnValue(new Promise<string | null>(() => undefined));
    const backend = new RedisKeyValueBackend(fake, { commandTimeoutMs: 20 });

    await expect(backend.get("k")).rejects.toMatchObject({
      code: "BACKEND_UNAVAILABLE",
      details: { op: "GET", redisCode: "ETIMEDOUT" },
    });
  });

  it("keeps server errors distinct from connectivity", async () => {
    const fake = new FakeNodeRedis();
    vi.spyOn(fake, "get").mockRejectedValue(new Error("WRONGTYPE Operation against a key holding the wrong kind of value"));
    const backend = new RedisKeyValueBackend(fake);

    await expect(backend.get("k")).rejects.toMatchObject({ code: "INTERNAL_ERROR" });
  });

  it("backs the session manager and sweep", async () => {
    const fake = new FakeNodeRedis();
    const backend = new RedisKeyValueBackend(fake);
    let seq = 0;
    const sessions = new SessionManager<{ device: string }>({
      backend,
      keys: new KeyLayout("t"),
      generateId: () => `s${++seq}`,
    });

    for (let i = 0; i < 3; i += 1) {
      await sessions.create("u1", { device: `d${i}` });
    }
    await backend.addToSet("t:usess:u1", "ghost1", 0);
    await backend.addToSet("t:usess:u1", "ghost2", 0);

    const report = await new SweepEngine({ sessions }).run({ mode: "orphans" });

    expect(report).toMatchObject({ status: "completed", liveFound: 3, orphansFound: 2, orphansRemoved: 2 });
    expect(fake.zsets.get("t:usess:u1")?.size).toBe(3);
  });
});
