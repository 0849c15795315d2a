/**
 * Write condition for {@link KeyValueBackend.setWithTtl}: `NX` only creates, `XX` only replaces.
 */
export type SetCondition = "NX" | "XX";

export type ScanPage = {
  /** `"0"` once the scan is complete. */
  cursor: string;
  keys: string[];
};

export type ScanOptions = {
  /** `"0"` (default) starts a new scan. */
  cursor?: string;
  /** Page size hint. */
  count?: number;
};

/**
 * Capability contract over the shared key-value store.
 *
 * Every method rejects with `SessionSyncError("BACKEND_UNAVAILABLE")` when the store
 * cannot be reached or a command times out. Mutations are idempotent at the key
 * level, so callers may retry a whole operation.
 */
export interface KeyValueBackend {
  get(key: string): Promise<string | null>;
  /** Returns whether the value was written (always true without a condition). */
  setWithTtl(key: string, value: string, ttlSeconds: number, condition?: SetCondition): Promise<boolean>;
  /** Returns whether a key was removed. */
  delete(key: string): Promise<boolean>;
  exists(key: string): Promise<boolean>;

  /** Adds or re-scores a member of an ordered collection. */
  addToSet(setKey: string, member: string, score: number): Promise<void>;
  /**
   * Adds `member` after every existing member: its score is `minScore` or one
   * above the current highest score, whichever is larger. Resolves the score given.
   */
  appendToSet(setKey: string, member: string, minScore: number): Promise<number>;
  removeFromSet(setKey: string, members: readonly string[]): Promise<number>;
  /** Members in ascending score order (oldest first for session indices). */
  membersOf(setKey: string): Promise<string[]>;
  setCardinality(setKey: string): Promise<number>;
  /**
   * Removes `member` only while `guardKey` does not exist; the check and the
   * removal happen as one step on the store.
   */
  removeFromSetIfAbsent(setKey: string, member: string, guardKey: string): Promise<boolean>;
  /** Deletes the collection when it has no members. Resolves true when the key no longer exists. */
  deleteSetIfEmpty(setKey: string): Promise<boolean>;

  /** One page of a cursor scan; never enumerates the whole key space in one call. */
  scanKeys(pattern: string, options?: ScanOptions): Promise<ScanPage>;

  /**
   * Returns the value and removes the key. Among concurrent callers at most one
   * receives the value.
   */
  atomicCheckAndDelete(key: string): Promise<string | null>;

  close?(): Promise<void>;
}

export const SCAN_START_CURSOR = "0";

/**
 * Lazily walks a scan one page at a time. Each yielded page carries the cursor it
 * was requested with, so an interrupted walk can restart from that page.
 */
export async function* scanAll(
  backend: KeyValueBackend,
  pattern: string,
  options?: ScanOptions,
): AsyncGenerator<ScanPage & { startCursor: string }> {
  let cursor = options?.cursor ?? SCAN_START_CURSOR;

  for (;;) {
    const page = await backend.scanKeys(pattern, { cursor, count: options?.count });
    yield { ...page, startCursor: cursor };

    if (page.cursor === SCAN_START_CURSOR) {
      return;
    }
    cursor = page.cursor;
  }
}
