import {
  consistencyStatus,
  describeError,
  SweepScheduler,
  toReportJson,
  type CleanupReport,
  type Logger,
  type SessionManager,
  type SessionSyncConfig,
  type SweepEngine,
  type SweepMode,
} from "@sessionsync/core";

export const OUTPUT_FORMATS = ["text", "json"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type Output = (text: string) => void;

export type SweepCommandOptions = {
  dryRun?: boolean;
  includeExpired?: boolean;
  maxAgeDays?: number;
  batchSize?: number;
  cursor?: string;
  format?: OutputFormat;
  signal?: AbortSignal;
};

/**
 * Runs one sweep and prints its report. Resolves the process exit code: a dry
 * run always succeeds; a repair run fails only when it aborted on the backend.
 */
export async function runSweepCommand(
  engine: SweepEngine,
  config: SessionSyncConfig,
  options: SweepCommandOptions,
  out: Output,
): Promise<number> {
  const report = await engine.run({
    mode: sweepMode(options),
    maxAgeDays: options.maxAgeDays ?? config.cleanup.maxAgeDays,
    batchSize: options.batchSize ?? config.cleanup.batchSize,
    includeExpired: options.includeExpired,
    cursor: options.cursor,
    signal: options.signal,
  });

  out(options.format === "json" ? JSON.stringify(toReportJson(report), null, 2) : formatReportText(report));

  if (options.dryRun) {
    return 0;
  }
  return report.status === "aborted" ? 1 : 0;
}

export function sweepMode(options: Pick<SweepCommandOptions, "dryRun" | "includeExpired">): SweepMode {
  if (options.dryRun) return "report";
  return options.includeExpired ? "orphans+expired" : "orphans";
}

/**
 * Deletes every session of one user and prints the summary as JSON.
 */
export async function clearUserCommand(
  sessions: SessionManager<unknown>,
  userKey: string,
  options: { dryRun?: boolean },
  out: Output,
): Promise<void> {
  const result = await sessions.deleteAllForUser(userKey, { dryRun: options.dryRun ?? false });
  out(
    JSON.stringify(
      {
        user: result.userId,
        index_members: result.indexMembers,
        sessions_found: result.sessionsFound,
        sessions_deleted: result.sessionsDeleted,
        missing_sessions: result.missingSessions,
        index_deleted: result.indexDeleted,
        dry_run: result.dryRun,
      },
      null,
      2,
    ),
  );
}

export type WatchOptions = {
  signal: AbortSignal;
  logger?: Logger;
  onReport?: (report: CleanupReport) => Promise<void> | void;
};

/**
 * Sweeps once, then on every cleanup interval until `signal` aborts. Resolves
 * after the in-flight run has finished.
 */
export async function watchCommand(
  engine: SweepEngine,
  config: SessionSyncConfig,
  options: WatchOptions,
): Promise<void> {
  const scheduler = new SweepScheduler({
    engine,
    intervalSeconds: config.cleanup.intervalSeconds,
    includeExpired: config.cleanup.includeExpired,
    maxAgeDays: config.cleanup.maxAgeDays,
    batchSize: config.cleanup.batchSize,
    keepAlive: true,
    logger: options.logger,
    onReport: options.onReport,
  });

  if (options.signal.aborted) {
    return;
  }

  const stopped = new Promise<void>((resolve) => {
    options.signal.addEventListener("abort", () => resolve(), { once: true });
  });

  options.logger?.info("Session sweep scheduler started.", {
    mode: scheduler.mode,
    intervalSeconds: config.cleanup.intervalSeconds,
  });

  const first = scheduler.runOnce().catch((error: unknown) => {
    options.logger?.error("Session sweep failed.", { error: describeError(error) });
    return null;
  });
  scheduler.start();

  await stopped;
  await first;
  await scheduler.stop();

  options.logger?.info("Session sweep scheduler stopped.");
}

/**
 * Human-readable operator report.
 */
export function formatReportText(report: CleanupReport): string {
  const lines = [
    "Session sweep report",
    `  Mode:      ${report.mode}${report.mode === "report" ? " (dry run)" : ""}`,
    `  Status:    ${report.status}`,
    `  Finished:  ${new Date(report.finishedAt).toISOString()}`,
    "",
    "Checked",
    `  User indices:        ${report.indicesScanned}`,
    `  Session references:  ${report.sessionRefsChecked}`,
    `  Live sessions:       ${report.liveFound}`,
    `  Orphan references:   ${report.orphansFound}`,
    `  Expired sessions:    ${report.expiredFound}`,
    "",
    "Repaired",
    `  Orphans removed:        ${report.orphansRemoved}`,
    `  Expired removed:        ${report.expiredRemoved}`,
    `  Empty indices removed:  ${report.emptyIndicesRemoved}`,
    "",
    `Consistency: ${consistencyStatus(report)}`,
  ];

  if (report.error) {
    lines.push(`Error: ${report.error}`);
  }
  if (report.resumeCursor !== null) {
    lines.push(`Resume with: --cursor ${report.resumeCursor}`);
  }

  return lines.join("\n");
}
