#!/usr/bin/env node
// ──────────────────────────────────────────────
// JobPulse - Command Line Entry Point
// ──────────────────────────────────────────────

import "dotenv/config";
import { Command } from "commander";
import { closeConnection, runMigrations } from "@jobpulse/database";
import { createLogger, getEnvOrThrow, loadConfig, sanitizeErrorMessage } from "@jobpulse/utils";
import { createPipelineServices, formatRunSummary, runJobMarketAnalysis } from "./runner.js";

const logger = createLogger("cli");

const program = new Command();

program
  .name("jobpulse")
  .description("Job market analysis workflow with checkpointed resumption")
  .version("1.0.0");

program
  .command("run")
  .description("Run the job market analysis, resuming from the last checkpoint")
  .option("--force-restart", "Discard checkpoints, cached jobs and stored documents")
  .option("--force-new", "Alias of --force-restart")
  .action(async (options: { forceRestart?: boolean; forceNew?: boolean }) => {
    const services = createPipelineServices(loadConfig());
    const controller = new AbortController();
    const onSignal = () => {
      logger.warn("Interrupt received, cancelling after the current stage");
      controller.abort();
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);

    try {
      const summary = await runJobMarketAnalysis(services, {
        forceRestart: Boolean(options.forceRestart || options.forceNew),
        signal: controller.signal,
      });
      for (const line of formatRunSummary(summary)) {
        console.log(line);
      }
      process.exitCode = summary.result.terminal === "END" ? 0 : 1;
    } finally {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      await services.close();
    }
  });

program
  .command("migrate")
  .description("Apply pending SQL migrations for the Postgres checkpoint store")
  .action(async () => {
    try {
      const applied = await runMigrations(getEnvOrThrow("DATABASE_URL"));
      console.log(applied.length === 0 ? "Database is up to date." : `Applied: ${applied.join(", ")}`);
    } finally {
      await closeConnection();
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.error({ error: sanitizeErrorMessage(err) }, "Command failed");
  console.error(sanitizeErrorMessage(err));
  process.exitCode = 1;
});
