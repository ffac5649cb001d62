/**
 * Status server and scheduler
 *
 * Endpoints:
 *   GET  /health  liveness
 *   GET  /status  latest run, watermarks, whether a run is going
 *   POST /run     start a run (202), or 409 while one is running
 *
 * The scheduler triggers a run every SYNC_INTERVAL_HOURS on the hour.
 */

import { serve, type ServerType } from "@hono/node-server";
import { Hono } from "hono";
import cron, { type ScheduledTask } from "node-cron";
import type { WatermarkStore } from "../db/watermark-store.js";
import { ConfigurationError, describeError, RunAlreadyInProgressError } from "../lib/errors.js";
import { setupLogger } from "../lib/logger.js";
import type { RunReporter, RunResult } from "../migration/run-reporter.js";

const logger = setupLogger("status-server");

/** The part of the orchestrator the server and scheduler drive */
export interface RunTrigger {
  runOnce(signal?: AbortSignal): Promise<RunResult>;
  isRunning(): boolean;
}

/**
 * Run once for a background trigger. Failures are logged, not thrown: the
 * trigger has nobody to report to.
 */
export async function runInBackground(
  trigger: RunTrigger,
  reason: string,
  signal?: AbortSignal
): Promise<RunResult | null> {
  try {
    return await trigger.runOnce(signal);
  } catch (error) {
    if (error instanceof RunAlreadyInProgressError) {
      logger.warn(`Skipping ${reason} run: ${error.message}`);
    } else {
      logger.error(`${reason} run failed: ${describeError(error)}`);
    }
    return null;
  }
}

// =============================================================================
// HTTP
// =============================================================================

export interface StatusAppDeps {
  trigger: RunTrigger;
  reporter: RunReporter;
  watermarks: WatermarkStore;
  /** Aborts runs started through POST /run on shutdown */
  signal?: AbortSignal;
}

export function createStatusApp(deps: StatusAppDeps): Hono {
  const app = new Hono();

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.get("/status", async (c) => {
    const watermarks = await deps.watermarks.list();
    return c.json(deps.reporter.status(watermarks, deps.trigger.isRunning()));
  });

  app.post("/run", (c) => {
    if (deps.trigger.isRunning()) {
      return c.json({ error: new RunAlreadyInProgressError().message }, 409);
    }
    void runInBackground(deps.trigger, "requested", deps.signal);
    return c.json({ status: "started" }, 202);
  });

  app.onError((error, c) => {
    logger.error(`${c.req.method} ${c.req.path} failed: ${describeError(error)}`);
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}

export function startStatusServer(app: Hono, port: number): ServerType {
  return serve({ fetch: app.fetch, port }, (info) => {
    logger.info(`Status server listening on port ${info.port}`);
  });
}

// =============================================================================
// Scheduler
// =============================================================================

/**
 * Cron expression for a run every `hours` hours, on the hour. 24 means once
 * a day at midnight.
 */
export function cronExpressionForInterval(hours: number): string {
  if (!Number.isInteger(hours) || hours < 1 || hours > 24) {
    throw new ConfigurationError([`SYNC_INTERVAL_HOURS: expected an integer from 1 to 24, got ${hours}`]);
  }
  return hours === 24 ? "0 0 * * *" : `0 */${hours} * * *`;
}

export interface SchedulerOptions {
  trigger: RunTrigger;
  intervalHours: number;
  timeZone: string;
  signal?: AbortSignal;
}

export class MigrationScheduler {
  private readonly expression: string;
  private task: ScheduledTask | null = null;

  constructor(private readonly options: SchedulerOptions) {
    this.expression = cronExpressionForInterval(options.intervalHours);
  }

  start(): void {
    if (this.task) {
      return;
    }
    this.task = cron.schedule(
      this.expression,
      () => {
        void this.tick();
      },
      { timezone: this.options.timeZone }
    );
    logger.info(`Scheduled runs at "${this.expression}" (${this.options.timeZone})`);
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
  }

  tick(): Promise<RunResult | null> {
    return runInBackground(this.options.trigger, "scheduled", this.options.signal);
  }
}
