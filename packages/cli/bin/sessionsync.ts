#!/usr/bin/env tsx
import "dotenv/config";
import { Command, InvalidArgumentError } from "commander";
import { describeError, loadSessionSyncConfig, type SessionSyncConfig } from "@sessionsync/core";

import { createRuntime } from "../src/bootstrap";
import { clearUserCommand, OUTPUT_FORMATS, runSweepCommand, watchCommand, type OutputFormat } from "../src/commands";
import { createCliLogger, toCoreLogger } from "../src/logger";

let config: SessionSyncConfig;
try {
  config = loadSessionSyncConfig();
} catch (error) {
  process.stderr.write(`${describeError(error)}\n`);
  process.exit(1);
}

const winstonLogger = createCliLogger({ level: config.logLevel });
const logger = toCoreLogger(winstonLogger);

const print = (text: string): void => {
  process.stdout.write(`${text}\n`);
};

const parseCount = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
};

const ensureFormat = (value: string): OutputFormat => {
  const match = OUTPUT_FORMATS.find((format) => format === value);
  if (!match) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_FORMATS.join(", ")}.`);
  }
  return match;
};

const shutdownSignal = (): AbortSignal => {
  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
  return controller.signal;
};

const program = new Command();

program.name("sessionsync").description("Maintain SessionSync session indices");

program
  .command("sweep")
  .description("Check user session indices against session records and repair drift")
  .option("--dry-run", "Report only; change nothing", false)
  .option("--include-expired", "Also delete sessions older than --max-age-days (counted only with --dry-run)", config.cleanup.includeExpired)
  .option("--max-age-days <days>", "Age cutoff for --include-expired", parseCount)
  .option("--batch-size <count>", "Keys requested per scan page", parseCount)
  .option("--cursor <cursor>", "Resume an interrupted sweep")
  .option("--format <format>", "Output format (text|json)", ensureFormat, "text")
  .action(
    async (options: {
      dryRun: boolean;
      includeExpired: boolean;
      maxAgeDays?: number;
      batchSize?: number;
      cursor?: string;
      format: OutputFormat;
    }) => {
      const runtime = createRuntime(config, { logger });
      try {
        process.exitCode = await runSweepCommand(
          runtime.engine,
          config,
          { ...options, signal: shutdownSignal() },
          print,
        );
      } finally {
        await runtime.close();
      }
    },
  );

program
  .command("watch")
  .description("Sweep on every CLEANUP_INTERVAL_SECONDS until interrupted")
  .action(async () => {
    const runtime = createRuntime(config, { logger });
    try {
      await watchCommand(runtime.engine, config, { signal: shutdownSignal(), logger });
    } finally {
      await runtime.close();
    }
  });

program
  .command("clear-user")
  .description("Delete every session of a user together with the user's index")
  .argument("<userKey>", "User identifier the sessions are indexed under")
  .option("--dry-run", "Show what would be deleted", false)
  .action(async (userKey: string, options: { dryRun: boolean }) => {
    const runtime = createRuntime(config, { logger });
    try {
      await clearUserCommand(runtime.sessions, userKey, options, print);
    } finally {
      await runtime.close();
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error("Command failed.", { error: describeError(error) });
  process.exitCode = 1;
});
