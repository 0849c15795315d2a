import { SessionSyncError } from "../errors";
import { nowMs, secondsToMs, type Clock } from "../utils/time";
import {
    SCAN_START_CURSOR,
    type KeyValueBackend,
    type ScanOptions,
    type ScanPage,
    type SetCondition,
} from "./KeyValueBackend";

type Entry =
    | { kind: "string"; value: string; expiresAt: number }
    | { kind: "set"; members: Map<string, number> };

export type MapKeyValueBackendOptions = {
    cleanupIntervalSeconds?: number; // default 60
    clock?: Clock;
};

export type BackendSnapshot = Record<string, string | Array<[string, number]>>;

const DEFAULT_SCAN_COUNT = 10;
const CURSOR_TAG = "k:";

/**
 * In-process backend with the store semantics the Redis backend has: expired keys
 * vanish, empty ordered sets disappear, scans page by cursor. Single-threaded
 * execution makes every method atomic.
 */
export class MapKeyValueBackend implements KeyValueBackend {
    private readonly map = new Map<string, Entry>();
    private readonly cleanupTimer: NodeJS.Timeout;
    private readonly clock: Clock;

    constructor(options?: MapKeyValueBackendOptions) {
        this.clock = options?.clock ?? nowMs;
        const interval = secondsToMs(options?.cleanupIntervalSeconds ?? 60);
        this.cleanupTimer = setInterval(() => this.cleanup(), interval);
        this.cleanupTimer.unref?.();
    }

    async get(key: string): Promise<string | null> {
        const e = this.read(key);
        if (!e) return null;
        if (e.kind !== "string") throw wrongType(key);
        return e.value;
    }

    async setWithTtl(key: string, value: string, ttlSeconds: number, condition?: SetCondition): Promise<boolean> {
        const present = this.read(key) !== null;
        if (condition === "NX" && present) return false;
        if (condition === "XX" && !present) return false;

        this.map.set(key, { kind: "string", value, expiresAt: this.clock() + secondsToMs(ttlSeconds) });
        return true;
    }

    async delete(key: string): Promise<boolean> {
        const present = this.read(key) !== null;
        this.map.delete(key);
        return present;
    }

    async exists(key: string): Promise<boolean> {
        return this.read(key) !== null;
    }

    async addToSet(setKey: string, member: string, score: number): Promise<void> {
        const e = this.read(setKey);
        if (e && e.kind !== "set") throw wrongType(setKey);

        const members = e?.members ?? new Map<string, number>();
        members.set(member, score);
        this.map.set(setKey, { kind: "set", members });
    }

    async appendToSet(setKey: string, member: string, minScore: number): Promise<number> {
        const e = this.readSet(setKey);
        let score = minScore;
        for (const s of e?.members.values() ?? []) {
            if (s + 1 > score) score = s + 1;
        }
        await this.addToSet(setKey, member, score);
        return score;
    }

    async removeFromSet(setKey: string, members: readonly string[]): Promise<number> {
        const e = this.readSet(setKey);
        if (!e) return 0;

        let removed = 0;
        for (const m of members) {
            if (e.members.delete(m)) removed += 1;
        }
        if (e.members.size === 0) this.map.delete(setKey);
        return removed;
    }

    async membersOf(setKey: string): Promise<string[]> {
        const e = this.readSet(setKey);
        if (!e) return [];

        return [...e.members.entries()]
            .sort(([ma, sa], [mb, sb]) => sa - sb || (ma < mb ? -1 : ma > mb ? 1 : 0))
            .map(([m]) => m);
    }

    async setCardinality(setKey: string): Promise<number> {
        return this.readSet(setKey)?.members.size ?? 0;
    }

    async removeFromSetIfAbsent(setKey: string, member: string, guardKey: string): Promise<boolean> {
        if (this.read(guardKey) !== null) return false;
        return (await this.removeFromSet(setKey, [member])) > 0;
    }

    async deleteSetIfEmpty(setKey: string): Promise<boolean> {
        const e = this.readSet(setKey);
        if (e && e.members.size > 0) return false;
        this.map.delete(setKey);
        return true;
    }

    async scanKeys(pattern: string, options?: ScanOptions): Promise<ScanPage> {
        const count = Math.max(1, options?.count ?? DEFAULT_SCAN_COUNT);
        const cursor = options?.cursor ?? SCAN_START_CURSOR;
        const after = cursor === SCAN_START_CURSOR ? null : decodeCursor(cursor);
        const matcher = globToRegExp(pattern);

        // Keys are visited in lexicographic order after the cursor key, so writes
        // made during a scan never make it repeat or skip a key that existed throughout.
        const candidates = [...this.map.keys()]
            .filter((k) => after === null || k > after)
            .sort();

        // `count` bounds the keys examined, not the keys returned (a page may be empty).
        const examined = candidates.slice(0, count);
        const keys = examined.filter((k) => this.read(k) !== null && matcher.test(k));
        const last = examined[examined.length - 1];

        if (last === undefined || examined.length === candidates.length) {
            return { cursor: SCAN_START_CURSOR, keys };
        }
        return { cursor: `${CURSOR_TAG}${last}`, keys };
    }

    async atomicCheckAndDelete(key: string): Promise<string | null> {
        // no await between the read and the delete
        const e = this.read(key);
        if (!e) return null;
        if (e.kind !== "string") throw wrongType(key);
        this.map.delete(key);
        return e.value;
    }

    async close(): Promise<void> {
        clearInterval(this.cleanupTimer);
        this.map.clear();
    }

    /**
     * Plain copy of every live key, for diagnostics and state comparisons.
     */
    snapshot(): BackendSnapshot {
        const out: BackendSnapshot = {};
        for (const k of [...this.map.keys()].sort()) {
            const e = this.read(k);
            if (!e) continue;
            out[k] = e.kind === "string" ? e.value : [...e.members.entries()].sort(([a], [b]) => (a < b ? -1 : 1));
        }
        return out;
    }

    private read(key: string): Entry | null {
        const e = this.map.get(key);
        if (!e) return null;

        if (e.kind === "string" && this.clock() >= e.expiresAt) {
            this.map.delete(key);
            return null;
        }
        return e;
    }

    private readSet(key: string): Extract<Entry, { kind: "set" }> | null {
        const e = this.read(key);
        if (!e) return null;
        if (e.kind !== "set") throw wrongType(key);
        return e;
    }

    private cleanup(): void {
        const now = this.clock();
        for (const [k, e] of this.map.entries()) {
            if (e.kind === "string" && now >= e.expiresAt) this.map.delete(k);
        }
    }
}

function wrongType(key: string): SessionSyncError {
    return new SessionSyncError("INTERNAL_ERROR", "Operation against a key holding the wrong kind of value.", undefined, {
        key,
    });
}

function decodeCursor(cursor: string): string {
    if (!cursor.startsWith(CURSOR_TAG)) {
        throw new SessionSyncError("INVALID_REQUEST", `Invalid scan cursor: ${cursor}`);
    }
    return cursor.slice(CURSOR_TAG.length);
}

function globToRegExp(pattern: string): RegExp {
    let source = "";
    for (const ch of pattern) {
        if (ch === "*") source += ".*";
        else if (ch === "?") source += ".";
        else source += ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    }
    return new RegExp(`^${source}$`);
}
