import { SessionSyncError } from "./errors";

export const DEFAULT_KEY_PREFIX = "appauth";

const PREFIX_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * Key names shared with existing deployments:
 *
 * - `<prefix>:sess:<sessionId>` session record
 * - `<prefix>:usess:<userKey>` per-user ordered session index
 * - `<prefix>:state:<stateToken>` handshake state entry
 */
export class KeyLayout {
  readonly prefix: string;

  constructor(prefix: string = DEFAULT_KEY_PREFIX) {
    // glob metacharacters in the prefix would widen the sweep pattern
    if (!PREFIX_PATTERN.test(prefix)) {
      throw new SessionSyncError("INVALID_CONFIG", `Invalid key prefix: ${prefix}`, undefined, { prefix });
    }
    this.prefix = prefix;
  }

  session(sessionId: string): string {
    return `${this.prefix}:sess:${sessionId}`;
  }

  userIndex(userKey: string): string {
    return `${this.prefix}:usess:${userKey}`;
  }

  state(stateToken: string): string {
    return `${this.prefix}:state:${stateToken}`;
  }

  lock(name: string): string {
    return `${this.prefix}:lock:${name}`;
  }

  userIndexPattern(): string {
    return `${this.prefix}:usess:*`;
  }

  userKeyFromIndex(indexKey: string): string | null {
    const head = `${this.prefix}:usess:`;
    return indexKey.startsWith(head) ? indexKey.slice(head.length) : null;
  }
}
