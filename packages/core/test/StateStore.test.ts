import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { KeyLayout, MapKeyValueBackend, SessionSyncError, StateStore } from "../src";

describe("StateStore", () => {
  let now = 5_000;
  let backend: MapKeyValueBackend;
  let store: StateStore;

  beforeEach(() => {
    now = 5_000;
    backend = new MapKeyValueBackend({ clock: () => now });
    store = new StateStore({ backend, keys: new KeyLayout("t"), ttlSeconds: 10, clock: () => now });
  });

  afterEach(async () => {
    await backend.close();
  });

  const input = { redirectUri: "https://app.example/callback", verifier: "test-verifier", provider: "github" };

  it("save_then_pop_returns_entry_once", async () => {
    const saved = await store.save("abc", input);
    expect(saved).toEqual({ ...input, createdAt: 5_000, expiresAt: 15_000 });
    expect(await backend.exists("t:state:abc")).toBe(true);

    expect(await store.popState("abc")).toEqual(saved);
    expect(await store.popState("abc")).toBeNull();
    expect(await backend.exists("t:state:abc")).toBe(false);
  });

  it("concurrent_pops_yield_exactly_one_entry", async () => {
    await store.save("race", input);

    const results = await Promise.all(Array.from({ length: 5 }, () => store.popState("race")));

    expect(results.filter((r) => r !== null)).toHaveLength(1);
  });

  it("expired_entry_is_gone", async () => {
    await store.save("old", input);
    now += 10_000;
    expect(await store.popState("old")).toBeNull();
  });

  it("unparseable_entry_pops_as_null", async () => {
    await backend.setWithTtl("t:state:junk", "{", 10);
    expect(await store.popState("junk")).toBeNull();
    expect(await backend.exists("t:state:junk")).toBe(false);
  });

  it("entry_with_wrong_field_types_pops_as_null", async () => {
    const entry = { ...input, createdAt: "5000", expiresAt: 15_000 };
    await backend.setWithTtl("t:state:shape", JSON.stringify(entry), 10);

    expect(await store.popState("shape")).toBeNull();
  });

  it("consumeState_fails_for_used_token", async () => {
    await store.save("once", input);
    await store.consumeState("once");

    const error = await store.consumeState("once").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(SessionSyncError);
    expect(error).toMatchObject({ code: "STATE_EXPIRED_OR_USED" });
  });

  it("empty_token_is_rejected_on_save_and_absent_on_pop", async () => {
    await expect(store.save("", input)).rejects.toMatchObject({ code: "INVALID_REQUEST" });
    expect(await store.popState("")).toBeNull();
  });
});
