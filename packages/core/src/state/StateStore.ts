import { z } from "zod";
import type { KeyValueBackend } from "../backend/KeyValueBackend";
import { SessionSyncError, type Logger } from "../errors";
import { KeyLayout } from "../keys";
import { nowMs, secondsToMs, type Clock } from "../utils/time";

/**
 * Short-lived handshake state saved before redirecting to an identity provider.
 */
export const HandshakeStateSchema = z.object({
  redirectUri: z.string(),
  verifier: z.string(),
  provider: z.string(),
  createdAt: z.number().finite(),
  expiresAt: z.number().finite(),
});

export type HandshakeState = z.infer<typeof HandshakeStateSchema>;

export type SaveStateInput = {
  redirectUri: string;
  verifier: string;
  provider: string;
};

export type StateStoreOptions = {
  backend: KeyValueBackend;
  keys?: KeyLayout;
  ttlSeconds?: number; // default 600
  clock?: Clock;
  logger?: Logger;
};

export const DEFAULT_STATE_TTL_SECONDS = 600;

/**
 * Single-use state entries under `<prefix>:state:<token>`.
 *
 * Reads go through the backend's atomic pop, so among concurrent consumers of
 * the same token at most one gets the entry. A missing entry may be expired,
 * already used or never issued; the store cannot tell these apart.
 */
export class StateStore {
  private readonly keys: KeyLayout;
  private readonly ttlSeconds: number;
  private readonly clock: Clock;

  constructor(private readonly opts: StateStoreOptions) {
    this.keys = opts.keys ?? new KeyLayout();
    this.ttlSeconds = opts.ttlSeconds ?? DEFAULT_STATE_TTL_SECONDS;
    this.clock = opts.clock ?? nowMs;
  }

  async save(stateToken: string, input: SaveStateInput): Promise<HandshakeState> {
    assertToken(stateToken);

    const createdAt = this.clock();
    const entry: HandshakeState = {
      redirectUri: input.redirectUri,
      verifier: input.verifier,
      provider: input.provider,
      createdAt,
      expiresAt: createdAt + secondsToMs(this.ttlSeconds),
    };

    await this.opts.backend.setWithTtl(this.keys.state(stateToken), JSON.stringify(entry), this.ttlSeconds);
    this.opts.logger?.debug("Handshake state saved.", {
      state: tokenHint(stateToken),
      provider: entry.provider,
    });
    return entry;
  }

  /**
   * Consumes the entry. A second call for the same token resolves null.
   */
  async popState(stateToken: string): Promise<HandshakeState | null> {
    if (stateToken === "") {
      return null;
    }

    const raw = await this.opts.backend.atomicCheckAndDelete(this.keys.state(stateToken));
    const entry = raw === null ? null : parseState(raw);

    if (entry && this.clock() >= entry.expiresAt) {
      this.opts.logger?.debug("Handshake state expired.", { state: tokenHint(stateToken) });
      return null;
    }

    this.opts.logger?.debug("Handshake state popped.", { state: tokenHint(stateToken), found: entry !== null });
    return entry;
  }

  /**
   * Consumes the entry or fails with `STATE_EXPIRED_OR_USED`. Callers treat the
   * failure as an authentication failure and never retry it.
   */
  async consumeState(stateToken: string): Promise<HandshakeState> {
    const entry = await this.popState(stateToken);
    if (!entry) {
      throw new SessionSyncError("STATE_EXPIRED_OR_USED", "Handshake state is expired, already used or unknown.");
    }
    return entry;
  }
}

function parseState(raw: string): HandshakeState | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  const result = HandshakeStateSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

function assertToken(stateToken: string): void {
  if (stateToken === "") {
    throw new SessionSyncError("INVALID_REQUEST", "stateToken must be a non-empty string.");
  }
}

function tokenHint(stateToken: string): string {
  return `${stateToken.slice(0, 8)}...`;
}
