import { SCAN_START_CURSOR, scanAll } from "../backend/KeyValueBackend";
import { isBackendUnavailable, SessionSyncError, type Logger } from "../errors";
import type { SessionManager } from "../session/SessionManager";
import { daysToMs, nowMs, type Clock } from "../utils/time";

/**
 * - `report`: classify only, never mutates. Too-old sessions are counted as
 *   expired only when the run sets `includeExpired`.
 * - `orphans`: remove references to absent records and drop emptied indices.
 * - `orphans+expired`: additionally delete live sessions issued before the
 *   max-age cutoff. This logs users out and is opt-in.
 */
export type SweepMode = "report" | "orphans" | "orphans+expired";

export type SweepStatus = "completed" | "aborted" | "cancelled";

export type CleanupReport = {
    mode: SweepMode;
    status: SweepStatus;
    indicesScanned: number;
    sessionRefsChecked: number;
    liveFound: number;
    orphansFound: number;
    orphansRemoved: number;
    expiredFound: number;
    expiredRemoved: number;
    emptyIndicesRemoved: number;
    pagesScanned: number;
    /** Cursor to pass back to resume an aborted or cancelled run; null once completed. */
    resumeCursor: string | null;
    error: string | null;
    startedAt: number;
    finishedAt: number;
};

export type SweepRunOptions = {
    mode: SweepMode;
    maxAgeDays?: number;
    batchSize?: number;
    /** In `report` mode, count sessions past the max-age cutoff as expired. */
    includeExpired?: boolean;
    /** Resume point from a previous {@link CleanupReport.resumeCursor}. */
    cursor?: string;
    signal?: AbortSignal;
};

export type SweepEngineOptions = {
    sessions: SessionManager<unknown>;
    maxAgeDays?: number; // default 30
    batchSize?: number; // default 100
    clock?: Clock;
    logger?: Logger;
};

export type ConsistencyStatus = "clean" | "repaired" | "needs_repair";

type IndexPass = {
    mode: SweepMode;
    classifyExpired: boolean;
    cutoff: number;
    report: CleanupReport;
};

const DEFAULT_MAX_AGE_DAYS = 30;
const DEFAULT_BATCH_SIZE = 100;

/**
 * Finds and repairs drift between user indices and session records.
 *
 * Takes no lock: every decision is made on a fresh read, and orphan removal
 * re-verifies the record's absence on the store at the moment of removal, so
 * running next to live traffic (or another sweep) can only repeat a removal,
 * never remove a live reference. A run interrupted at any point leaves the
 * indices unchanged or closer to correct, and resumes from its cursor.
 */
export class SweepEngine {
    private readonly sessions: SessionManager<unknown>;
    private readonly clock: Clock;

    constructor(private readonly opts: SweepEngineOptions) {
        this.sessions = opts.sessions;
        this.clock = opts.clock ?? nowMs;
    }

    async run(options: SweepRunOptions): Promise<CleanupReport> {
        const report = emptyReport(options.mode, this.clock());
        const pass = this.createPass(options, report);
        const pattern = this.sessions.keys.userIndexPattern();
        const count = options.batchSize ?? this.opts.batchSize ?? DEFAULT_BATCH_SIZE;

        let resumeFrom = options.cursor ?? SCAN_START_CURSOR;
        this.opts.logger?.info("Session sweep started.", { mode: options.mode, cursor: resumeFrom });

        try {
            for await (const page of scanAll(this.sessions.backend, pattern, { cursor: resumeFrom, count })) {
                if (options.signal?.aborted) {
                    report.status = "cancelled";
                    break;
                }

                for (const indexKey of page.keys) {
                    await this.sweepIndex(indexKey, pass);
                }

                report.pagesScanned += 1;
                resumeFrom = page.cursor;
            }
        } catch (error) {
            if (!isBackendUnavailable(error)) {
                throw error;
            }
            report.status = "aborted";
            report.error = error.message;
            this.opts.logger?.warn("Session sweep aborted; resume from cursor.", {
                cursor: resumeFrom,
                error: error.message,
            });
        }

        report.resumeCursor = report.status === "completed" ? null : resumeFrom;
        report.finishedAt = this.clock();

        this.opts.logger?.info("Session sweep finished.", toReportJson(report));
        return report;
    }

    /**
     * Same pass as {@link run}, for a single user's index.
     */
    async sweepUser(userId: string, mode: SweepMode, maxAgeDays?: number): Promise<CleanupReport> {
        const report = emptyReport(mode, this.clock());
        const pass = this.createPass({ mode, maxAgeDays }, report);

        await this.sweepIndex(this.sessions.keys.userIndex(userId), pass);

        report.finishedAt = this.clock();
        return report;
    }

    private createPass(
        options: Pick<SweepRunOptions, "mode" | "maxAgeDays" | "includeExpired">,
        report: CleanupReport
    ): IndexPass {
        const maxAgeDays = options.maxAgeDays ?? this.opts.maxAgeDays ?? DEFAULT_MAX_AGE_DAYS;
        if (!Number.isFinite(maxAgeDays) || maxAgeDays < 0) {
            throw new SessionSyncError("INVALID_REQUEST", "maxAgeDays must be a non-negative number.", undefined, {
                maxAgeDays,
            });
        }
        return {
            mode: options.mode,
            classifyExpired:
                options.mode === "orphans+expired" || (options.mode === "report" && options.includeExpired === true),
            cutoff: this.clock() - daysToMs(maxAgeDays),
            report,
        };
    }

    private async sweepIndex(indexKey: string, pass: IndexPass): Promise<void> {
        const { report, mode } = pass;
        const repair = mode !== "report";
        const backend = this.sessions.backend;

        report.indicesScanned += 1;
        const members = await backend.membersOf(indexKey);
        let removedHere = 0;

        for (const sessionId of members) {
            report.sessionRefsChecked += 1;
            const sessionKey = this.sessions.keys.session(sessionId);
            const read = await this.sessions.readRecord(sessionId);

            if (read.state === "missing") {
                report.orphansFound += 1;
                if (repair && (await backend.removeFromSetIfAbsent(indexKey, sessionId, sessionKey))) {
                    report.orphansRemoved += 1;
                    removedHere += 1;
                }
                continue;
            }

            const tooOld = pass.classifyExpired && read.state !== "corrupt" && read.record.issuedAt < pass.cutoff;
            if (!tooOld) {
                report.liveFound += 1;
                continue;
            }

            report.expiredFound += 1;
            if (!repair) {
                continue;
            }
            await backend.delete(sessionKey);
            await backend.removeFromSet(indexKey, [sessionId]);
            report.expiredRemoved += 1;
            removedHere += 1;
        }

        if (removedHere > 0 && (await backend.deleteSetIfEmpty(indexKey))) {
            report.emptyIndicesRemoved += 1;
        }

        if (members.length > 0 && removedHere > 0) {
            this.opts.logger?.debug("Repaired session index.", {
                user: this.sessions.keys.userKeyFromIndex(indexKey),
                references: members.length,
                removed: removedHere,
            });
        }
    }
}

function emptyReport(mode: SweepMode, startedAt: number): CleanupReport {
    return {
        mode,
        status: "completed",
        indicesScanned: 0,
        sessionRefsChecked: 0,
        liveFound: 0,
        orphansFound: 0,
        orphansRemoved: 0,
        expiredFound: 0,
        expiredRemoved: 0,
        emptyIndicesRemoved: 0,
        pagesScanned: 0,
        resumeCursor: null,
        error: null,
        startedAt,
        finishedAt: startedAt,
    };
}

/**
 * Operator-facing shape consumed by log pipelines and the CLI.
 */
export function toReportJson(report: CleanupReport): Record<string, unknown> {
    return {
        mode: report.mode,
        status: report.status,
        indices_scanned: report.indicesScanned,
        session_refs_checked: report.sessionRefsChecked,
        live_found: report.liveFound,
        orphans_found: report.orphansFound,
        orphans_removed: report.orphansRemoved,
        expired_found: report.expiredFound,
        expired_removed: report.expiredRemoved,
        empty_indices_removed: report.emptyIndicesRemoved,
        pages_scanned: report.pagesScanned,
        resume_cursor: report.resumeCursor,
        error: report.error,
        duration_ms: report.finishedAt - report.startedAt,
    };
}

export function consistencyStatus(report: CleanupReport): ConsistencyStatus {
    if (report.orphansFound === 0) {
        return "clean";
    }
    return report.orphansRemoved >= report.orphansFound ? "repaired" : "needs_repair";
}
