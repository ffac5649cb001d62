/**
 * Run reporter
 *
 * Keeps the result of the latest run and renders the status document served
 * by GET /status and `cli status`. With a data directory the latest run is
 * also written to last-run.json so the status survives a restart.
 */

import path from "node:path";
import { z } from "zod";
import { readJsonFile, writeJsonDurable } from "../lib/durable-file.js";
import { setupLogger } from "../lib/logger.js";
import { formatLocalTimestamp } from "../lib/time.js";
import type { Watermark } from "../db/watermark-store.js";
import { METRIC_TYPES, SOURCES, type MetricType, type Source } from "../services/types.js";

const logger = setupLogger("run-reporter");

export const MAX_ERROR_SAMPLES = 5;
const LAST_RUN_FILE = "last-run.json";

// =============================================================================
// Types
// =============================================================================

export interface MetricOutcome {
  fetched: number;
  uploaded: number;
  skippedDuplicate: number;
  failed: number;
  errorSamples: string[];
}

export type LaneState = "DONE" | "FAILED";

export interface LaneOutcome extends MetricOutcome {
  source: Source;
  metricType: MetricType;
  state: LaneState;
  watermarkBefore: Date;
  watermarkAfter: Date;
}

/** What the orchestrator hands over when its lanes have finished */
export interface RunDraft {
  runId: string;
  startedAt: Date;
  cancelled: boolean;
  lanes: LaneOutcome[];
}

export interface RunResult extends RunDraft {
  finishedAt: Date;
  perMetric: Record<MetricType, MetricOutcome>;
}

/** A timestamp as stored (UTC) and as read by a person (TZ) */
export interface RenderedTime {
  utc: string;
  local: string;
}

export interface StatusDocument {
  running: boolean;
  timeZone: string;
  lastRun: {
    runId: string;
    startedAt: RenderedTime;
    finishedAt: RenderedTime;
    cancelled: boolean;
    perMetric: Record<MetricType, MetricOutcome>;
    lanes: Array<
      Omit<LaneOutcome, "watermarkBefore" | "watermarkAfter"> & {
        watermarkBefore: RenderedTime;
        watermarkAfter: RenderedTime;
      }
    >;
  } | null;
  watermarks: Array<{
    source: Source;
    metricType: MetricType;
    lastMigratedAt: RenderedTime;
    lastSourceRecordId: string | null;
  }>;
}

// =============================================================================
// Outcome helpers
// =============================================================================

export function emptyOutcome(): MetricOutcome {
  return { fetched: 0, uploaded: 0, skippedDuplicate: 0, failed: 0, errorSamples: [] };
}

export function addErrorSample(outcome: MetricOutcome, message: string): void {
  if (outcome.errorSamples.length < MAX_ERROR_SAMPLES) {
    outcome.errorSamples.push(message);
  }
}

/**
 * Sum lane outcomes per metric type. Every metric type is present, lanes or
 * not.
 */
export function aggregatePerMetric(lanes: LaneOutcome[]): Record<MetricType, MetricOutcome> {
  const perMetric = {
    WEIGHT: emptyOutcome(),
    BMI: emptyOutcome(),
    BODY_FAT: emptyOutcome(),
    SYSTOLIC: emptyOutcome(),
    DIASTOLIC: emptyOutcome(),
    PULSE: emptyOutcome(),
  } satisfies Record<MetricType, MetricOutcome>;

  for (const lane of lanes) {
    const total = perMetric[lane.metricType];
    total.fetched += lane.fetched;
    total.uploaded += lane.uploaded;
    total.skippedDuplicate += lane.skippedDuplicate;
    total.failed += lane.failed;
    for (const sample of lane.errorSamples) {
      addErrorSample(total, sample);
    }
  }
  return perMetric;
}

// =============================================================================
// Persistence schema
// =============================================================================

const isoDate = z
  .string()
  .datetime()
  .transform((value) => new Date(value));

const outcomeSchema = z.object({
  fetched: z.number().int().nonnegative(),
  uploaded: z.number().int().nonnegative(),
  skippedDuplicate: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  errorSamples: z.array(z.string()).max(MAX_ERROR_SAMPLES),
});

const runSchema = z.object({
  runId: z.string(),
  startedAt: isoDate,
  finishedAt: isoDate,
  cancelled: z.boolean(),
  lanes: z.array(
    outcomeSchema.extend({
      source: z.enum(SOURCES),
      metricType: z.enum(METRIC_TYPES),
      state: z.enum(["DONE", "FAILED"]),
      watermarkBefore: isoDate,
      watermarkAfter: isoDate,
    })
  ),
});

function freezeResult(result: RunResult): RunResult {
  for (const lane of result.lanes) {
    Object.freeze(lane.errorSamples);
    Object.freeze(lane);
  }
  for (const metricType of METRIC_TYPES) {
    Object.freeze(result.perMetric[metricType].errorSamples);
    Object.freeze(result.perMetric[metricType]);
  }
  Object.freeze(result.lanes);
  Object.freeze(result.perMetric);
  return Object.freeze(result);
}

// =============================================================================
// Reporter
// =============================================================================

export interface RunReporterOptions {
  timeZone: string;
  /** Directory for last-run.json; null keeps the latest run in memory only */
  dataDir: string | null;
}

export class RunReporter {
  private readonly timeZone: string;
  private readonly filePath: string | null;
  private last: RunResult | null = null;

  constructor(options: RunReporterOptions) {
    this.timeZone = options.timeZone;
    this.filePath = options.dataDir ? path.join(options.dataDir, LAST_RUN_FILE) : null;
  }

  /**
   * Load the run persisted by an earlier process. A missing or unreadable
   * file leaves the reporter empty.
   */
  async load(): Promise<RunResult | null> {
    if (!this.filePath) {
      return this.last;
    }

    const raw = await readJsonFile(this.filePath);
    if (raw === null) {
      return this.last;
    }

    const parsed = runSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(`Ignoring unreadable ${this.filePath}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
      return this.last;
    }

    this.last = freezeResult({ ...parsed.data, perMetric: aggregatePerMetric(parsed.data.lanes) });
    return this.last;
  }

  /**
   * Stamp, aggregate and keep a finished run.
   */
  async publish(draft: RunDraft, finishedAt: Date): Promise<RunResult> {
    const result = freezeResult({
      runId: draft.runId,
      startedAt: draft.startedAt,
      finishedAt,
      cancelled: draft.cancelled,
      lanes: draft.lanes.map((lane) => ({ ...lane, errorSamples: [...lane.errorSamples] })),
      perMetric: aggregatePerMetric(draft.lanes),
    });
    this.last = result;

    if (this.filePath) {
      await writeJsonDurable(this.filePath, {
        runId: result.runId,
        startedAt: result.startedAt.toISOString(),
        finishedAt: result.finishedAt.toISOString(),
        cancelled: result.cancelled,
        lanes: result.lanes.map((lane) => ({
          ...lane,
          watermarkBefore: lane.watermarkBefore.toISOString(),
          watermarkAfter: lane.watermarkAfter.toISOString(),
        })),
      });
    }

    let uploaded = 0;
    let failed = 0;
    for (const outcome of Object.values(result.perMetric)) {
      uploaded += outcome.uploaded;
      failed += outcome.failed;
    }
    logger.info(
      `Run ${result.runId} finished: ${uploaded} uploaded, ${failed} failed` +
        (result.cancelled ? " (cancelled)" : "")
    );
    return result;
  }

  latest(): RunResult | null {
    return this.last;
  }

  status(watermarks: Watermark[], running: boolean): StatusDocument {
    const render = (date: Date): RenderedTime => ({
      utc: date.toISOString(),
      local: formatLocalTimestamp(date, this.timeZone),
    });

    const last = this.last;
    return {
      running,
      timeZone: this.timeZone,
      lastRun: last && {
        runId: last.runId,
        startedAt: render(last.startedAt),
        finishedAt: render(last.finishedAt),
        cancelled: last.cancelled,
        perMetric: last.perMetric,
        lanes: last.lanes.map((lane) => ({
          ...lane,
          watermarkBefore: render(lane.watermarkBefore),
          watermarkAfter: render(lane.watermarkAfter),
        })),
      },
      watermarks: watermarks.map((w) => ({
        source: w.source,
        metricType: w.metricType,
        lastMigratedAt: render(w.lastMigratedAt),
        lastSourceRecordId: w.lastSourceRecordId,
      })),
    };
  }
}
