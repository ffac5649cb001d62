#!/usr/bin/env node
/**
 * metrics-bridge CLI
 *
 * Usage:
 *   metrics-bridge <command> [options]
 *
 * Commands:
 *   run      Run the migration once; exits 1 when a lane failed
 *   serve    Run at start-up, then every SYNC_INTERVAL_HOURS, and serve /status
 *   status   Print the last run and the watermarks as JSON
 *
 * Options:
 *   --log-level   Set log level (debug|info|warn|error)
 *
 * Examples:
 *   npx tsx packages/connector/src/cli.ts run --log-level debug
 *   npx tsx packages/connector/src/cli.ts serve
 */

import { createApp, type App } from "./app.js";
import { loadConfigFromEnvironment } from "./lib/config.js";
import { describeError } from "./lib/errors.js";
import { isLogLevel, LOG_LEVELS, setLogLevel, type LogLevel } from "./lib/logger.js";
import type { RunResult } from "./migration/run-reporter.js";
import {
  createStatusApp,
  MigrationScheduler,
  runInBackground,
  startStatusServer,
} from "./server/status.js";
import { METRIC_TYPES } from "./services/types.js";

const COMMANDS = ["run", "serve", "status"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  const commands: readonly string[] = COMMANDS;
  return commands.includes(value);
}

function printUsage(): void {
  console.log("Usage: metrics-bridge <run|serve|status> [options]");
  console.log("");
  console.log("Commands:");
  console.log("  run            Run the migration once");
  console.log("  serve          Run on a schedule and serve the status endpoint");
  console.log("  status         Print the last run and the watermarks");
  console.log("");
  console.log("Options:");
  console.log(`  --log-level    Set log level (${Object.keys(LOG_LEVELS).join("|")})`);
  console.log("  --help, -h     Show this help message");
}

function printSummary(result: RunResult): void {
  console.log(`[OK] Run ${result.runId}${result.cancelled ? " (cancelled)" : ""}:`);
  for (const metricType of METRIC_TYPES) {
    const o = result.perMetric[metricType];
    if (o.fetched + o.failed === 0) {
      continue;
    }
    console.log(
      `  ${metricType}: fetched ${o.fetched}, uploaded ${o.uploaded}, ` +
        `duplicates ${o.skippedDuplicate}, failed ${o.failed}`
    );
  }
  for (const lane of result.lanes.filter((l) => l.state === "FAILED")) {
    console.log(`  [FAILED] ${lane.source}/${lane.metricType}: ${lane.errorSamples.at(-1) ?? "unknown error"}`);
  }
}

/**
 * Abort the controller on SIGINT / SIGTERM, then run the extra cleanup.
 */
function onShutdown(controller: AbortController, cleanup: () => void = () => {}): void {
  const handler = (signal: NodeJS.Signals) => {
    console.log(`[INFO] ${signal} received, shutting down...`);
    controller.abort();
    cleanup();
  };
  process.once("SIGINT", handler);
  process.once("SIGTERM", handler);
}

async function runCommand(app: App): Promise<number> {
  const controller = new AbortController();
  onShutdown(controller);

  const result = await app.orchestrator.runOnce(controller.signal);
  printSummary(result);
  return result.lanes.some((lane) => lane.state === "FAILED") ? 1 : 0;
}

async function serveCommand(app: App): Promise<void> {
  const controller = new AbortController();
  const { orchestrator, reporter, watermarks, config } = app;

  const server = startStatusServer(
    createStatusApp({ trigger: orchestrator, reporter, watermarks, signal: controller.signal }),
    config.statusPort
  );
  const scheduler = new MigrationScheduler({
    trigger: orchestrator,
    intervalHours: config.syncIntervalHours,
    timeZone: config.timeZone,
    signal: controller.signal,
  });

  onShutdown(controller, () => {
    scheduler.stop();
    server.close();
  });

  scheduler.start();
  await runInBackground(orchestrator, "start-up", controller.signal);
}

async function statusCommand(app: App): Promise<void> {
  const watermarks = await app.watermarks.list();
  const running = await app.orchestrator.isRunActive();
  console.log(JSON.stringify(app.reporter.status(watermarks, running), null, 2));
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  let command: Command | null = null;
  let logLevel: LogLevel | null = null;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (arg === "--help" || arg === "-h") {
      printUsage();
      process.exit(0);
    }

    if (arg === "--log-level") {
      const level = args[i + 1] ?? "";
      if (!isLogLevel(level)) {
        console.error(`Invalid --log-level value. Must be one of: ${Object.keys(LOG_LEVELS).join(", ")}`);
        process.exit(1);
      }
      logLevel = level;
      i++;
      continue;
    }

    if (command === null && isCommand(arg)) {
      command = arg;
      continue;
    }

    console.error(`Unknown argument: ${arg}`);
    printUsage();
    process.exit(1);
  }

  if (command === null) {
    printUsage();
    process.exit(1);
  }

  const config = loadConfigFromEnvironment();
  const app = await createApp(config);
  // --log-level wins over LOG_LEVEL
  if (logLevel) {
    setLogLevel(logLevel);
  }

  switch (command) {
    case "run":
      process.exitCode = await runCommand(app);
      break;
    case "serve":
      await serveCommand(app);
      break;
    case "status":
      await statusCommand(app);
      break;
  }
}

main().catch((error) => {
  console.error(`[ERROR] ${describeError(error)}`);
  process.exit(1);
});
