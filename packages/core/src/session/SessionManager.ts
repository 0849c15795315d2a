import type { KeyValueBackend } from "../backend/KeyValueBackend";
import { describeError, isBackendUnavailable, SessionSyncError, type Logger } from "../errors";
import { KeyLayout } from "../keys";
import { TtlPolicy } from "../policy/TtlPolicy";
import { nowMs, type Clock } from "../utils/time";
import { newSessionId } from "../utils/uuid";
import { NoopLockProvider, type LockProvider } from "./LockProvider";
import { createJsonSessionSerializer, type SessionSerializer, type StoredSession } from "./SessionSerializer";

export type SessionRecord<TPayload> = StoredSession<TPayload> & { sessionId: string };

export type SessionSummary<TPayload> = {
    sessionId: string;
    issuedAt: number;
    expiresAt: number;
    renewedAt: number;
    payload: TPayload;
};

export type AbsentReason = "missing" | "expired" | "corrupt" | "owner_mismatch";

/**
 * Result of {@link SessionManager.lookup}. `unavailable` means "cannot verify",
 * which callers must not confuse with a logged-out session.
 */
export type SessionLookup<TPayload> =
    | { status: "found"; record: SessionRecord<TPayload> }
    | { status: "absent"; reason: AbsentReason }
    | { status: "unavailable"; error: SessionSyncError };

/**
 * Raw state of a session key, before any ownership check.
 */
export type RecordRead<TPayload> =
    | { state: "live"; record: SessionRecord<TPayload> }
    | { state: "expired"; record: SessionRecord<TPayload> }
    | { state: "missing" }
    | { state: "corrupt" };

/**
 * Emitted when creating a session pushed older sessions of the same user out.
 */
export type CapacityEvictedEvent = {
    userId: string;
    evictedSessionIds: string[];
    newSessionId: string;
};

export type CreateSessionResult<TPayload> = {
    sessionId: string;
    record: SessionRecord<TPayload>;
    evicted: string[];
};

export type RenewResult = {
    renewed: boolean;
    expiresAt: number;
};

export type ClearUserResult = {
    userId: string;
    indexMembers: number;
    sessionsFound: number;
    sessionsDeleted: number;
    missingSessions: number;
    indexDeleted: boolean;
    dryRun: boolean;
};

export type SessionManagerOptions<TPayload> = {
    backend: KeyValueBackend;
    keys?: KeyLayout;
    ttl?: TtlPolicy;
    maxSessionsPerUser?: number; // default 5, 0 = unlimited
    listLimit?: number; // default 20
    lockProvider?: LockProvider;
    serializer?: SessionSerializer<TPayload>;
    generateId?: () => string;
    clock?: Clock;
    logger?: Logger;
    onEvicted?: (event: CapacityEvictedEvent) => Promise<void> | void;
};

const DEFAULT_MAX_SESSIONS_PER_USER = 5;
const DEFAULT_LIST_LIMIT = 20;
const MAX_ID_ATTEMPTS = 3;
const INDEX_LOCK_TTL_SECONDS = 10;

/**
 * Owns session records and the per-user session index.
 *
 * Index and record are two keys without a transaction between them. Every
 * mutation writes them back to back (record first on delete, so a logout takes
 * effect even if the second write is lost); a crash in between leaves an orphan
 * reference that {@link listSessions}, {@link lookup} with a user, or the sweep
 * removes later.
 */
export class SessionManager<TPayload> {
    readonly backend: KeyValueBackend;
    readonly keys: KeyLayout;
    readonly ttl: TtlPolicy;
    readonly clock: Clock;

    private readonly maxSessionsPerUser: number;
    private readonly listLimit: number;
    private readonly lockProvider: LockProvider;
    private readonly serializer: SessionSerializer<TPayload>;
    private readonly generateId: () => string;

    constructor(private readonly opts: SessionManagerOptions<TPayload>) {
        this.backend = opts.backend;
        this.keys = opts.keys ?? new KeyLayout();
        this.ttl = opts.ttl ?? new TtlPolicy();
        this.maxSessionsPerUser = opts.maxSessionsPerUser ?? DEFAULT_MAX_SESSIONS_PER_USER;
        this.listLimit = opts.listLimit ?? DEFAULT_LIST_LIMIT;
        this.lockProvider = opts.lockProvider ?? new NoopLockProvider();
        this.serializer = opts.serializer ?? createJsonSessionSerializer<TPayload>();
        this.generateId = opts.generateId ?? newSessionId;
        this.clock = opts.clock ?? nowMs;
    }

    /**
     * Creates a session and registers it in the user's index.
     *
     * When the index grows past `maxSessionsPerUser`, the oldest sessions of the
     * same user are deleted: a new login can log out an existing device. The
     * evicted ids are returned and passed to `onEvicted`.
     *
     * `options.ttl` sets the initial lifetime of this session only; renewals
     * follow the manager's policy.
     */
    async create(
        userId: string,
        payload: TPayload,
        options?: { ttl?: TtlPolicy }
    ): Promise<CreateSessionResult<TPayload>> {
        assertIdentifier(userId, "userId");

        const ttl = options?.ttl ?? this.ttl;
        const issuedAt = this.clock();
        const stored: StoredSession<TPayload> = {
            userId,
            payload,
            issuedAt,
            expiresAt: ttl.computeExpiry(issuedAt, issuedAt),
            renewedAt: issuedAt,
        };

        const sessionId = await this.writeNewRecord(stored, ttl);
        // Logins in the same millisecond still index in arrival order.
        await this.backend.appendToSet(this.keys.userIndex(userId), sessionId, issuedAt);

        const evicted = await this.enforceCapacity(userId, sessionId);

        this.opts.logger?.debug("Session created.", {
            userId,
            expiresAt: stored.expiresAt,
            evicted: evicted.length,
        });

        return { sessionId, record: { ...stored, sessionId }, evicted };
    }

    /**
     * Reads a session and reports why it is absent. With `userId`, a dangling
     * reference in that user's index is removed before returning.
     */
    async lookup(sessionId: string, options?: { userId?: string }): Promise<SessionLookup<TPayload>> {
        let read: RecordRead<TPayload>;
        try {
            read = await this.readRecord(sessionId);
        } catch (error) {
            if (isBackendUnavailable(error)) {
                return { status: "unavailable", error };
            }
            throw error;
        }

        const userId = options?.userId;

        if (read.state === "live") {
            if (userId === undefined || read.record.userId === userId) {
                return { status: "found", record: read.record };
            }
            await this.discardReference(sessionId, read, userId);
            return { status: "absent", reason: "owner_mismatch" };
        }

        await this.discardReference(sessionId, read, userId);
        return { status: "absent", reason: read.state };
    }

    /**
     * Like {@link lookup}, but degrades an unreachable backend to `null` for read
     * paths that tolerate staleness. The degradation is logged.
     */
    async fetch(sessionId: string, options?: { userId?: string }): Promise<SessionRecord<TPayload> | null> {
        const result = await this.lookup(sessionId, options);

        if (result.status === "unavailable") {
            this.opts.logger?.warn("Session backend unavailable; treating session as absent.", {
                sessionId,
                error: result.error.message,
            });
            return null;
        }

        return result.status === "found" ? result.record : null;
    }

    /**
     * Applies sliding expiration. Writes only when the policy grants a materially
     * later expiry, and only while the record still exists, so renewing never
     * resurrects a session deleted in the meantime.
     */
    async renew(sessionId: string, record: StoredSession<TPayload>): Promise<RenewResult> {
        const now = this.clock();
        const plan = this.ttl.planRenewal(record, now);
        if (!plan.renew) {
            return { renewed: false, expiresAt: record.expiresAt };
        }

        const next: StoredSession<TPayload> = {
            userId: record.userId,
            payload: record.payload,
            issuedAt: record.issuedAt,
            expiresAt: plan.expiresAt,
            renewedAt: now,
        };

        const written = await this.backend.setWithTtl(
            this.keys.session(sessionId),
            this.serializer.serialize(next),
            this.ttl.storageTtlSeconds(plan.expiresAt, now),
            "XX"
        );

        if (!written) {
            this.opts.logger?.debug("Renewal skipped; session no longer exists.", { sessionId });
            return { renewed: false, expiresAt: record.expiresAt };
        }

        return { renewed: true, expiresAt: plan.expiresAt };
    }

    /**
     * Deletes a session and its index reference. Returns false without mutating
     * anything when `userId` is given and the session belongs to someone else.
     */
    async delete(sessionId: string, options?: { userId?: string }): Promise<boolean> {
        const key = this.keys.session(sessionId);
        const raw = await this.backend.get(key);
        const stored = raw === null ? null : this.serializer.deserialize(raw);

        if (stored && options?.userId !== undefined && stored.userId !== options.userId) {
            this.opts.logger?.warn("Refusing to delete a session owned by another user.", {
                sessionId,
                userId: options.userId,
            });
            return false;
        }

        const owner = options?.userId ?? stored?.userId;
        const removed = await this.backend.delete(key);

        if (owner !== undefined) {
            const indexKey = this.keys.userIndex(owner);
            await this.backend.removeFromSet(indexKey, [sessionId]);
            await this.backend.deleteSetIfEmpty(indexKey);
        }

        return removed;
    }

    /**
     * Live sessions of a user, newest first. Every dangling reference read on the
     * way is removed from the index.
     */
    async listSessions(userId: string): Promise<SessionSummary<TPayload>[]> {
        const members = await this.backend.membersOf(this.keys.userIndex(userId));
        const recent = members.slice(-this.listLimit).reverse();

        const live: SessionSummary<TPayload>[] = [];
        let stale = 0;

        for (const sessionId of recent) {
            const read = await this.readRecord(sessionId);
            if (read.state === "live" && read.record.userId === userId) {
                live.push(toSummary(read.record));
                continue;
            }

            stale += 1;
            await this.discardReference(sessionId, read, userId);
        }

        if (stale > 0) {
            this.opts.logger?.info("Removed dangling session references.", { userId, removed: stale });
        }

        return live;
    }

    /**
     * Deletes every session referenced by a user's index, then the references.
     * Sessions found in the index but owned by another user are left alone.
     */
    async deleteAllForUser(userId: string, options?: { dryRun?: boolean }): Promise<ClearUserResult> {
        const dryRun = options?.dryRun ?? false;
        const indexKey = this.keys.userIndex(userId);
        const members = await this.backend.membersOf(indexKey);

        let sessionsFound = 0;
        let sessionsDeleted = 0;
        let missingSessions = 0;

        for (const sessionId of members) {
            const read = await this.readRecord(sessionId);
            const owned = (read.state === "live" || read.state === "expired") && read.record.userId === userId;
            if (!owned && read.state !== "corrupt") {
                missingSessions += 1;
                continue;
            }

            sessionsFound += 1;
            if (!dryRun && (await this.backend.delete(this.keys.session(sessionId)))) {
                sessionsDeleted += 1;
            }
        }

        let indexDeleted = false;
        if (!dryRun && members.length > 0) {
            // Removing the members read (rather than the key) keeps a session
            // registered concurrently by a new login.
            await this.backend.removeFromSet(indexKey, members);
            indexDeleted = await this.backend.deleteSetIfEmpty(indexKey);
        }

        this.opts.logger?.info("Cleared user sessions.", {
            userId,
            sessionsDeleted,
            missingSessions,
            dryRun,
        });

        return {
            userId,
            indexMembers: members.length,
            sessionsFound,
            sessionsDeleted,
            missingSessions,
            indexDeleted,
            dryRun,
        };
    }

    async readRecord(sessionId: string): Promise<RecordRead<TPayload>> {
        const raw = await this.backend.get(this.keys.session(sessionId));
        if (raw === null) {
            return { state: "missing" };
        }

        const stored = this.serializer.deserialize(raw);
        if (!stored) {
            this.opts.logger?.warn("Invalid session record.", { sessionId });
            return { state: "corrupt" };
        }

        const record: SessionRecord<TPayload> = { ...stored, sessionId };
        if (this.clock() >= stored.expiresAt) {
            return { state: "expired", record };
        }
        return { state: "live", record };
    }

    private async writeNewRecord(stored: StoredSession<TPayload>, ttl: TtlPolicy): Promise<string> {
        const raw = this.serializer.serialize(stored);
        const ttlSeconds = ttl.storageTtlSeconds(stored.expiresAt, stored.issuedAt);

        for (let attempt = 1; attempt <= MAX_ID_ATTEMPTS; attempt += 1) {
            const sessionId = this.generateId();
            if (await this.backend.setWithTtl(this.keys.session(sessionId), raw, ttlSeconds, "NX")) {
                return sessionId;
            }
            this.opts.logger?.warn("Session id collision; regenerating.", { attempt });
        }

        throw new SessionSyncError("INTERNAL_ERROR", "Could not allocate a unique session id.", undefined, {
            attempts: MAX_ID_ATTEMPTS,
        });
    }

    private async enforceCapacity(userId: string, newSessionId: string): Promise<string[]> {
        if (this.maxSessionsPerUser <= 0) {
            return [];
        }

        const indexKey = this.keys.userIndex(userId);
        const evicted = await this.lockProvider.withLock(`usess:${userId}`, INDEX_LOCK_TTL_SECONDS, async () => {
            // Fresh read right before acting; a concurrent login may have evicted already.
            const members = await this.backend.membersOf(indexKey);
            const over = members.length - this.maxSessionsPerUser;
            if (over <= 0) {
                return [];
            }

            const victims = members.filter((id) => id !== newSessionId).slice(0, over);
            for (const id of victims) {
                await this.backend.delete(this.keys.session(id));
            }
            await this.backend.removeFromSet(indexKey, victims);
            return victims;
        });

        if (evicted.length > 0) {
            this.opts.logger?.info("Evicted oldest sessions over capacity.", {
                userId,
                evicted: evicted.length,
                limit: this.maxSessionsPerUser,
            });
            await this.opts.onEvicted?.({ userId, evictedSessionIds: evicted, newSessionId });
        }

        return evicted;
    }

    /**
     * Lazy cleanup for a reference that did not resolve to a live session of
     * `userId`. Failures are logged and left to the sweep.
     */
    private async discardReference(
        sessionId: string,
        read: RecordRead<TPayload>,
        userId: string | undefined
    ): Promise<void> {
        const sessionKey = this.keys.session(sessionId);
        const indices = new Set<string>();
        if (userId !== undefined) indices.add(userId);
        if (read.state === "expired") indices.add(read.record.userId);

        try {
            if (read.state === "expired" || read.state === "corrupt") {
                await this.backend.delete(sessionKey);
            }

            for (const owner of indices) {
                const indexKey = this.keys.userIndex(owner);
                if (read.state === "live") {
                    // owner mismatch: the record is valid, the pairing is not
                    await this.backend.removeFromSet(indexKey, [sessionId]);
                } else {
                    await this.backend.removeFromSetIfAbsent(indexKey, sessionId, sessionKey);
                }
                await this.backend.deleteSetIfEmpty(indexKey);
            }
        } catch (error) {
            if (!isBackendUnavailable(error)) {
                throw error;
            }
            this.opts.logger?.warn("Lazy session cleanup failed; leaving it to the sweep.", {
                sessionId,
                error: describeError(error),
            });
        }
    }
}

function toSummary<TPayload>(record: SessionRecord<TPayload>): SessionSummary<TPayload> {
    return {
        sessionId: record.sessionId,
        issuedAt: record.issuedAt,
        expiresAt: record.expiresAt,
        renewedAt: record.renewedAt,
        payload: record.payload,
    };
}

function assertIdentifier(value: string, name: string): void {
    if (value.trim() === "") {
        throw new SessionSyncError("INVALID_REQUEST", `${name} must be a non-empty string.`);
    }
}
