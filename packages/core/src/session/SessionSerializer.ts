import { z } from "zod";

/**
 * Persisted session record stored under `<prefix>:sess:<sessionId>`.
 */
export type StoredSession<TPayload> = {
  userId: string;
  payload: TPayload;
  issuedAt: number;
  expiresAt: number;
  renewedAt: number;
};

/**
 * Codec contract for session records. `deserialize` returns null for records it
 * cannot read, which callers treat as corrupt.
 */
export type SessionSerializer<TPayload> = {
  serialize(value: StoredSession<TPayload>): string;
  deserialize(raw: string): StoredSession<TPayload> | null;
};

export function serializeSession<TPayload>(value: StoredSession<TPayload>): string {
  return JSON.stringify(value);
}

const Timestamp = z.number().finite();

/**
 * Envelope of a persisted session. The payload is checked separately against
 * the serializer's payload schema.
 */
export const StoredSessionSchema = z.object({
  userId: z.string().min(1),
  payload: z.unknown(),
  issuedAt: Timestamp,
  expiresAt: Timestamp,
  renewedAt: Timestamp.optional(),
});

/**
 * Accepts any payload that is present. Payloads are opaque to the store.
 */
export function anyPayload<TPayload>(): z.ZodType<TPayload> {
  return z.custom<TPayload>((value) => value !== undefined);
}

export function deserializeSession<TPayload>(
  raw: string,
  payloadSchema: z.ZodType<TPayload> = anyPayload<TPayload>(),
): StoredSession<TPayload> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  const envelope = StoredSessionSchema.safeParse(parsed);
  if (!envelope.success) {
    return null;
  }
  const payload = payloadSchema.safeParse(envelope.data.payload);
  if (!payload.success) {
    return null;
  }

  const { userId, issuedAt, expiresAt, renewedAt } = envelope.data;
  return { userId, payload: payload.data, issuedAt, expiresAt, renewedAt: renewedAt ?? issuedAt };
}

/**
 * JSON codec. Pass `payloadSchema` to treat records with an unexpected payload
 * shape as corrupt.
 */
export function createJsonSessionSerializer<TPayload>(
  payloadSchema: z.ZodType<TPayload> = anyPayload<TPayload>(),
): SessionSerializer<TPayload> {
  return {
    serialize: serializeSession,
    deserialize: (raw) => deserializeSession(raw, payloadSchema),
  };
}
