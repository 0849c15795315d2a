import { describeError, type Logger } from "../errors";
import { secondsToMs } from "../utils/time";
import { toReportJson, type CleanupReport, type SweepEngine, type SweepMode } from "./SweepEngine";

export type SweepSchedulerOptions = {
  engine: SweepEngine;
  intervalSeconds?: number; // default 3600
  includeExpired?: boolean; // default false
  maxAgeDays?: number;
  batchSize?: number;
  /** Keep the process alive while the timer is armed. Default false. */
  keepAlive?: boolean;
  logger?: Logger;
  onReport?: (report: CleanupReport) => Promise<void> | void;
};

const DEFAULT_INTERVAL_SECONDS = 3600;

/**
 * Runs the sweep periodically. Runs never overlap; a run that aborted on an
 * unreachable backend is resumed from its cursor by the next tick.
 */
export class SweepScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<CleanupReport | null> | null = null;
  private resumeCursor: string | undefined;

  constructor(private readonly opts: SweepSchedulerOptions) {}

  get mode(): SweepMode {
    return this.opts.includeExpired ? "orphans+expired" : "orphans";
  }

  start(): void {
    if (this.timer) return;

    const interval = secondsToMs(this.opts.intervalSeconds ?? DEFAULT_INTERVAL_SECONDS);
    this.timer = setInterval(() => {
      void this.tick();
    }, interval);
    if (!this.opts.keepAlive) {
      this.timer.unref?.();
    }
  }

  /**
   * Stops the timer and waits for an in-flight run.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.running;
  }

  /**
   * Runs one sweep now, or returns null when a run is already in progress.
   */
  async runOnce(): Promise<CleanupReport | null> {
    if (this.running) {
      this.opts.logger?.debug("Session sweep already running; skipping.");
      return null;
    }

    this.running = this.execute();
    try {
      return await this.running;
    } finally {
      this.running = null;
    }
  }

  private async execute(): Promise<CleanupReport> {
    const report = await this.opts.engine.run({
      mode: this.mode,
      maxAgeDays: this.opts.maxAgeDays,
      batchSize: this.opts.batchSize,
      cursor: this.resumeCursor,
    });

    this.resumeCursor = report.resumeCursor ?? undefined;

    if (report.orphansFound > 0) {
      this.opts.logger?.warn("Session sweep found orphan references.", toReportJson(report));
    }

    await this.opts.onReport?.(report);
    return report;
  }

  private async tick(): Promise<void> {
    try {
      await this.runOnce();
    } catch (error) {
      this.opts.logger?.error("Scheduled session sweep failed.", { error: describeError(error) });
    }
  }
}
