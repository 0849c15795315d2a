import { describe, expect, it } from "vitest";
import { z } from "zod";
import { createJsonSessionSerializer, deserializeSession } from "../src";

const record = { userId: "u1", payload: { device: "laptop" }, issuedAt: 1_000, expiresAt: 5_000, renewedAt: 2_000 };

describe("SessionSerializer", () => {
  it("reads_back_a_serialized_record", () => {
    const serializer = createJsonSessionSerializer<{ device: string }>();
    expect(serializer.deserialize(serializer.serialize(record))).toEqual(record);
  });

  it("defaults_renewedAt_to_issuedAt", () => {
    const { renewedAt: _renewedAt, ...legacy } = record;
    expect(deserializeSession(JSON.stringify(legacy))).toEqual({ ...legacy, renewedAt: 1_000 });
  });

  it("treats_malformed_records_as_corrupt", () => {
    expect(deserializeSession("{")).toBeNull();
    expect(deserializeSession("[]")).toBeNull();
    expect(deserializeSession(JSON.stringify({ ...record, userId: "" }))).toBeNull();
    expect(deserializeSession(JSON.stringify({ ...record, expiresAt: "5000" }))).toBeNull();

    const { payload: _payload, ...withoutPayload } = record;
    expect(deserializeSession(JSON.stringify(withoutPayload))).toBeNull();
  });

  it("checks_the_payload_against_a_schema", () => {
    const serializer = createJsonSessionSerializer(z.object({ device: z.string() }));

    expect(serializer.deserialize(JSON.stringify(record))?.payload).toEqual({ device: "laptop" });
    expect(serializer.deserialize(JSON.stringify({ ...record, payload: { device: 7 } }))).toBeNull();
  });
});
