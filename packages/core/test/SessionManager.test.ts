import { afterEach, describe, expect, it, vi } from "vitest";
import {
  KeyLayout,
  MapKeyValueBackend,
  SessionManager,
  SessionSyncError,
  TtlPolicy,
  type SessionManagerOptions,
} from "../src";

type Payload = { device: string };

class UnreachableBackend extends MapKeyValueBackend {
  override async get(_key: string): Promise<string | null> {
    throw new SessionSyncError("BACKEND_UNAVAILABLE", "connection refused");
  }
}

function createFixture(overrides: Partial<SessionManagerOptions<Payload>> & { backend?: MapKeyValueBackend } = {}) {
  const clock = { now: 1_000_000 };
  let seq = 0;
  const backend = overrides.backend ?? new MapKeyValueBackend({ clock: () => clock.now });
  const manager = new SessionManager<Payload>({
    backend,
    keys: new KeyLayout("t"),
    generateId: () => `s${++seq}`,
    clock: () => clock.now,
    ...overrides,
  });
  return { clock, backend, manager };
}

const backends: MapKeyValueBackend[] = [];

function track<T extends { backend: unknown }>(fixture: T): T {
  if (fixture.backend instanceof MapKeyValueBackend) backends.push(fixture.backend);
  return fixture;
}

describe("SessionManager", () => {
  afterEach(async () => {
    await Promise.all(backends.splice(0).map((b) => b.close()));
  });

  it("create_writes_record_and_index_reference", async () => {
    const { backend, manager } = track(createFixture());

    const result = await manager.create("u1", { device: "laptop" });

    expect(result.sessionId).toBe("s1");
    expect(result.evicted).toEqual([]);
    expect(result.record).toEqual({
      sessionId: "s1",
      userId: "u1",
      payload: { device: "laptop" },
      issuedAt: 1_000_000,
      expiresAt: 4_600_000,
      renewedAt: 1_000_000,
    });
    expect(await backend.exists("t:sess:s1")).toBe(true);
    expect(await backend.membersOf("t:usess:u1")).toEqual(["s1"]);
  });

  it("create_accepts_a_per_session_ttl_policy", async () => {
    const { clock, manager } = track(createFixture());
    const short = new TtlPolicy({ slidingEnabled: false, defaultTtlSeconds: 120 });

    const result = await manager.create("u1", { device: "kiosk" }, { ttl: short });

    expect(result.record.expiresAt).toBe(1_120_000);
    clock.now += 121_000;
    await expect(manager.fetch("s1")).resolves.toBeNull();
  });

  it("create_rejects_empty_user", async () => {
    const { manager } = track(createFixture());
    await expect(manager.create("  ", { device: "x" })).rejects.toMatchObject({ code: "INVALID_REQUEST" });
  });

  it("create_regenerates_id_on_collision", async () => {
    const ids = ["dup", "dup", "fresh"];
    const { backend, manager } = track(createFixture({ generateId: () => ids.shift() ?? "never" }));

    await manager.create("u1", { device: "a" });
    const second = await manager.create("u1", { device: "b" });

    expect(second.sessionId).toBe("fresh");
    expect(await backend.membersOf("t:usess:u1")).toEqual(["dup", "fresh"]);
  });

  it("sixth_session_evicts_the_oldest", async () => {
    const onEvicted = vi.fn();
    const { clock, backend, manager } = track(createFixture({ onEvicted }));

    let last: Awaited<ReturnType<typeof manager.create>> | undefined;
    for (let i = 0; i < 6; i += 1) {
      last = await manager.create("u1", { device: `d${i}` });
      clock.now += 1_000;
    }

    expect(last?.evicted).toEqual(["s1"]);
    expect(await backend.exists("t:sess:s1")).toBe(false);
    expect(await backend.membersOf("t:usess:u1")).toEqual(["s2", "s3", "s4", "s5", "s6"]);
    expect(onEvicted).toHaveBeenCalledTimes(1);
    expect(onEvicted).toHaveBeenCalledWith({ userId: "u1", evictedSessionIds: ["s1"], newSessionId: "s6" });
  });

  it("logins_within_one_millisecond_evict_in_arrival_order", async () => {
    const ids = ["zz", "mm", "aa", "qq", "bb", "cc"];
    const { backend, manager } = track(createFixture({ generateId: () => ids.shift() ?? "never" }));

    let last: Awaited<ReturnType<typeof manager.create>> | undefined;
    for (let i = 0; i < 6; i += 1) {
      last = await manager.create("u1", { device: `d${i}` });
    }

    expect(last?.evicted).toEqual(["zz"]);
    expect(await backend.exists("t:sess:zz")).toBe(false);
    expect(await backend.membersOf("t:usess:u1")).toEqual(["mm", "aa", "qq", "bb", "cc"]);
    const listed = await manager.listSessions("u1");
    expect(listed.map((s) => s.sessionId)).toEqual(["cc", "bb", "qq", "aa", "mm"]);
  });

  it("zero_capacity_means_unlimited", async () => {
    const { clock, backend, manager } = track(createFixture({ maxSessionsPerUser: 0 }));

    for (let i = 0; i < 7; i += 1) {
      await manager.create("u1", { device: `d${i}` });
      clock.now += 1_000;
    }

    expect(await backend.setCardinality("t:usess:u1")).toBe(7);
  });

  it("lookup_reports_missing_session", async () => {
    const { manager } = track(createFixture());
    expect(await manager.lookup("nope")).toEqual({ status: "absent", reason: "missing" });
  });

  it("lookup_removes_expired_record_and_reference", async () => {
    const ttl = new TtlPolicy({ slidingSeconds: 60, minSeconds: 600 });
    const { clock, backend, manager } = track(createFixture({ ttl }));

    await manager.create("u1", { device: "a" });
    clock.now += 120_000;

    expect(await manager.lookup("s1")).toEqual({ status: "absent", reason: "expired" });
    expect(backend.snapshot()).toEqual({});
  });

  it("lookup_with_other_user_reports_owner_mismatch_and_keeps_record", async () => {
    const { backend, manager } = track(createFixture());

    await manager.create("u1", { device: "a" });
    await backend.addToSet("t:usess:u2", "s1", 1);

    expect(await manager.lookup("s1", { userId: "u2" })).toEqual({ status: "absent", reason: "owner_mismatch" });
    expect(await backend.exists("t:sess:s1")).toBe(true);
    expect(await backend.exists("t:usess:u2")).toBe(false);
    expect(await backend.membersOf("t:usess:u1")).toEqual(["s1"]);
  });

  it("lookup_discards_corrupt_record", async () => {
    const { backend, manager } = track(createFixture());

    await backend.setWithTtl("t:sess:bad", "not-json", 60);
    await backend.addToSet("t:usess:u1", "bad", 1);

    expect(await manager.lookup("bad", { userId: "u1" })).toEqual({ status: "absent", reason: "corrupt" });
    expect(backend.snapshot()).toEqual({});
  });

  it("lookup_reports_unavailable_backend_and_fetch_degrades_to_null", async () => {
    const backend = new UnreachableBackend();
    const warn = vi.fn();
    const { manager } = track(
      createFixture({ backend, logger: { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() } })
    );

    const result = await manager.lookup("s1");
    expect(result.status).toBe("unavailable");

    expect(await manager.fetch("s1")).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("listSessions_returns_newest_first_and_drops_out_of_band_deletes", async () => {
    const { clock, backend, manager } = track(createFixture());

    for (let i = 0; i < 3; i += 1) {
      await manager.create("u1", { device: `d${i}` });
      clock.now += 1_000;
    }
    await backend.delete("t:sess:s2");

    const sessions = await manager.listSessions("u1");

    expect(sessions.map((s) => s.sessionId)).toEqual(["s3", "s1"]);
    expect(sessions[0]).toEqual({
      sessionId: "s3",
      issuedAt: 1_002_000,
      expiresAt: 4_602_000,
      renewedAt: 1_002_000,
      payload: { device: "d2" },
    });
    expect(await backend.membersOf("t:usess:u1")).toEqual(["s1", "s3"]);
  });

  it("listSessions_honours_list_limit", async () => {
    const { clock, manager } = track(createFixture({ listLimit: 2 }));

    for (let i = 0; i < 4; i += 1) {
      await manager.create("u1", { device: `d${i}` });
      clock.now += 1_000;
    }

    expect((await manager.listSessions("u1")).map((s) => s.sessionId)).toEqual(["s4", "s3"]);
  });

  it("renew_slides_expiry_up_to_absolute_cap", async () => {
    const ttl = new TtlPolicy({ slidingSeconds: 600, absoluteSeconds: 900 });
    const { clock, manager } = track(createFixture({ ttl }));

    const { sessionId } = await manager.create("u1", { device: "a" });

    clock.now = 1_400_000;
    const first = await manager.fetch(sessionId);
    expect(first?.expiresAt).toBe(1_600_000);
    expect(await manager.renew(sessionId, first ?? fail())).toEqual({ renewed: true, expiresAt: 1_900_000 });

    clock.now = 1_800_000;
    const second = await manager.fetch(sessionId);
    expect(second?.renewedAt).toBe(1_400_000);
    expect(await manager.renew(sessionId, second ?? fail())).toEqual({ renewed: false, expiresAt: 1_900_000 });
  });

  it("renew_does_not_resurrect_deleted_session", async () => {
    const ttl = new TtlPolicy({ slidingSeconds: 600 });
    const { clock, backend, manager } = track(createFixture({ ttl }));

    const { sessionId, record } = await manager.create("u1", { device: "a" });
    await manager.delete(sessionId);

    clock.now += 400_000;
    expect(await manager.renew(sessionId, record)).toEqual({ renewed: false, expiresAt: record.expiresAt });
    expect(await backend.exists("t:sess:s1")).toBe(false);
  });

  it("delete_removes_record_and_index", async () => {
    const { backend, manager } = track(createFixture());

    await manager.create("u1", { device: "a" });

    expect(await manager.delete("s1")).toBe(true);
    expect(backend.snapshot()).toEqual({});
    expect(await manager.delete("s1")).toBe(false);
  });

  it("delete_refuses_session_of_another_user", async () => {
    const { backend, manager } = track(createFixture());

    await manager.create("u1", { device: "a" });

    expect(await manager.delete("s1", { userId: "u2" })).toBe(false);
    expect(await backend.exists("t:sess:s1")).toBe(true);
  });

  it("deleteAllForUser_clears_sessions_and_index", async () => {
    const { clock, backend, manager } = track(createFixture());

    for (let i = 0; i < 3; i += 1) {
      await manager.create("u1", { device: `d${i}` });
      clock.now += 1_000;
    }
    await manager.create("u2", { device: "other" });
    await backend.delete("t:sess:s2");

    const dry = await manager.deleteAllForUser("u1", { dryRun: true });
    expect(dry).toEqual({
      userId: "u1",
      indexMembers: 3,
      sessionsFound: 2,
      sessionsDeleted: 0,
      missingSessions: 1,
      indexDeleted: false,
      dryRun: true,
    });
    expect(await backend.setCardinality("t:usess:u1")).toBe(3);

    const result = await manager.deleteAllForUser("u1");
    expect(result).toEqual({
      userId: "u1",
      indexMembers: 3,
      sessionsFound: 2,
      sessionsDeleted: 2,
      missingSessions: 1,
      indexDeleted: true,
      dryRun: false,
    });
    expect(Object.keys(backend.snapshot())).toEqual(["t:sess:s4", "t:usess:u2"]);
  });
});

function fail(): never {
  throw new Error("expected a session");
}
