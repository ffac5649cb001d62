/**
 * Migration orchestrator
 *
 * One run moves every configured (source, metric type) lane from its
 * watermark to the newest record the source has. Lanes run concurrently and
 * contain their own failures; a lane never takes another one down.
 *
 * Lane states:
 *   IDLE → AUTHENTICATING → FETCHING → TRANSFORMING → UPLOADING ⇄ ADVANCING → DONE
 *   FAILED from any state
 *
 * A watermark only moves forward, and only past records the sink accepted or
 * already held.
 */

import { randomUUID } from "node:crypto";
import type { MigrationSettings } from "../lib/config.js";
import {
  describeError,
  DuplicateRejected,
  PermanentUploadError,
  RateLimitedError,
  RunCancelledError,
  TransientFetchError,
  TransientUploadError,
  ValidationError,
} from "../lib/errors.js";
import { setupLogger } from "../lib/logger.js";
import { abortableSleep } from "../lib/time.js";
import type { RunLock } from "../lib/run-lock.js";
import type { Watermark, WatermarkStore } from "../db/watermark-store.js";
import {
  dedupKey,
  type Measurement,
  type MeasurementSink,
  type MeasurementSource,
  type MetricType,
} from "../services/types.js";
import { normalizeMeasurement } from "./transform.js";
import {
  addErrorSample,
  emptyOutcome,
  type LaneOutcome,
  type RunReporter,
  type RunResult,
} from "./run-reporter.js";

const logger = setupLogger("orchestrator");

export type LanePhase =
  | "IDLE"
  | "AUTHENTICATING"
  | "FETCHING"
  | "TRANSFORMING"
  | "UPLOADING"
  | "ADVANCING"
  | "DONE"
  | "FAILED";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export { abortableSleep };

export interface OrchestratorOptions {
  sources: MeasurementSource[];
  sink: MeasurementSink;
  watermarks: WatermarkStore;
  lock: RunLock;
  reporter: RunReporter;
  settings: MigrationSettings;
  sleep?: Sleep;
  now?: () => Date;
  newRunId?: () => string;
}

/** Ends a lane early */
class LaneAbort extends Error {
  constructor(
    message: string,
    /** The message is already among the lane's error samples */
    readonly recorded: boolean = false
  ) {
    super(message);
  }
}

interface Lane {
  source: MeasurementSource;
  metricType: MetricType;
}

export class MigrationOrchestrator {
  private readonly sources: MeasurementSource[];
  private readonly sink: MeasurementSink;
  private readonly watermarks: WatermarkStore;
  private readonly lock: RunLock;
  private readonly reporter: RunReporter;
  private readonly settings: MigrationSettings;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly newRunId: () => string;

  constructor(options: OrchestratorOptions) {
    this.sources = options.sources;
    this.sink = options.sink;
    this.watermarks = options.watermarks;
    this.lock = options.lock;
    this.reporter = options.reporter;
    this.settings = options.settings;
    this.sleep = options.sleep ?? abortableSleep;
    this.now = options.now ?? (() => new Date());
    this.newRunId = options.newRunId ?? randomUUID;
  }

  isRunning(): boolean {
    return this.lock.isHeld();
  }

  /**
   * Also sees a run started by another process on the same data directory.
   */
  isRunActive(): Promise<boolean> {
    return this.lock.isRunActive();
  }

  /**
   * Run every lane once.
   *
   * @throws RunAlreadyInProgressError when another run holds the lock
   */
  async runOnce(signal?: AbortSignal): Promise<RunResult> {
    await this.lock.acquire();
    try {
      const runId = this.newRunId();
      const startedAt = this.now();
      const lanes: Lane[] = this.sources.flatMap((source) =>
        source.metricTypes.map((metricType) => ({ source, metricType }))
      );
      logger.info(`Run ${runId} started with ${lanes.length} lanes`);

      await this.beginSourceRuns();
      const outcomes = await Promise.all(lanes.map((lane) => this.runLane(lane, signal)));

      return await this.reporter.publish(
        { runId, startedAt, cancelled: signal?.aborted ?? false, lanes: outcomes },
        this.now()
      );
    } finally {
      await this.lock.release();
    }
  }

  /**
   * Hand every source the watermarks of all its lanes, so metrics that share
   * a download can bound it. A store failure leaves sources unprepared; the
   * lanes then hit the same failure on their own.
   */
  private async beginSourceRuns(): Promise<void> {
    let stored: Watermark[];
    try {
      stored = await this.watermarks.list();
    } catch (error) {
      logger.warn(`Could not list watermarks: ${describeError(error)}`);
      return;
    }

    for (const source of this.sources) {
      if (!source.beginRun) {
        continue;
      }
      const marks = new Map<MetricType, Date>();
      for (const metricType of source.metricTypes) {
        const mark = stored.find((w) => w.source === source.source && w.metricType === metricType);
        marks.set(metricType, mark?.lastMigratedAt ?? new Date(0));
      }
      source.beginRun(marks);
    }
  }

  // ===========================================================================
  // Lane
  // ===========================================================================

  private async runLane(lane: Lane, signal?: AbortSignal): Promise<LaneOutcome> {
    const name = `${lane.source.source}/${lane.metricType}`;
    const outcome = emptyOutcome();
    let phase: LanePhase = "IDLE";
    const enter = (next: LanePhase) => {
      logger.debug(`[${name}] ${phase} -> ${next}`);
      phase = next;
    };

    let watermarkBefore = new Date(0);
    let watermark = watermarkBefore;

    const finish = (state: "DONE" | "FAILED"): LaneOutcome => ({
      source: lane.source.source,
      metricType: lane.metricType,
      state,
      ...outcome,
      watermarkBefore,
      watermarkAfter: watermark,
    });

    try {
      watermarkBefore = (await this.watermarks.get(lane.source.source, lane.metricType)).lastMigratedAt;
      watermark = watermarkBefore;

      if (signal?.aborted) {
        throw new LaneAbort("Run cancelled");
      }

      enter("AUTHENTICATING");
      await lane.source.authenticate();
      await this.sink.authenticate();

      enter("FETCHING");
      const records = await this.fetchWithRetry(lane, watermark, signal);
      if (signal?.aborted) {
        throw new LaneAbort("Run cancelled");
      }
      outcome.fetched = records.length;

      const seen = new Set<string>();
      let frozen = false;

      for (const raw of records) {
        if (signal?.aborted) {
          throw new LaneAbort("Run cancelled");
        }

        enter("TRANSFORMING");
        let measurement: Measurement;
        try {
          measurement = normalizeMeasurement(raw, this.settings.plausibleRanges);
        } catch (error) {
          if (!(error instanceof ValidationError)) {
            throw error;
          }
          outcome.failed++;
          addErrorSample(outcome, describeError(error));
          logger.warn(`[${name}] Dropped record ${raw.sourceRecordId}: ${error.message}`);
          continue;
        }

        const key = dedupKey(measurement);
        if (seen.has(key) || measurement.recordedAt.getTime() <= watermark.getTime()) {
          outcome.skippedDuplicate++;
          continue;
        }
        seen.add(key);

        enter("UPLOADING");
        const result = await this.uploadWithRetry(name, measurement, signal);

        if (result.kind === "failed") {
          outcome.failed++;
          addErrorSample(outcome, result.message);
          logger.warn(`[${name}] Upload of ${measurement.sourceRecordId} failed: ${result.message}`);
          if (result.rateLimited) {
            frozen = true;
          }
          if (result.fatal) {
            throw new LaneAbort(result.message, true);
          }
          continue;
        }

        if (result.kind === "uploaded") {
          outcome.uploaded++;
        } else {
          outcome.skippedDuplicate++;
        }

        if (!frozen && measurement.recordedAt.getTime() > watermark.getTime()) {
          enter("ADVANCING");
          await this.watermarks.advance(
            lane.source.source,
            lane.metricType,
            measurement.recordedAt,
            measurement.sourceRecordId
          );
          watermark = measurement.recordedAt;
        }
      }

      enter("DONE");
      logger.info(
        `[${name}] fetched ${outcome.fetched}, uploaded ${outcome.uploaded}, ` +
          `duplicates ${outcome.skippedDuplicate}, failed ${outcome.failed}`
      );
      return finish("DONE");
    } catch (error) {
      const message = error instanceof LaneAbort ? error.message : describeError(error);
      if (!(error instanceof LaneAbort && error.recorded)) {
        addErrorSample(outcome, message);
      }
      logger.error(`[${name}] Lane failed in ${phase}: ${message}`);
      enter("FAILED");
      return finish("FAILED");
    }
  }

  // ===========================================================================
  // Fetch
  // ===========================================================================

  private async fetchWithRetry(lane: Lane, since: Date, signal?: AbortSignal): Promise<Measurement[]> {
    const { maxFetchAttempts } = this.settings;

    for (let attempt = 1; ; attempt++) {
      try {
        const records: Measurement[] = [];
        for await (const record of lane.source.fetchSince(lane.metricType, since, signal)) {
          if (signal?.aborted) {
            throw new LaneAbort("Run cancelled");
          }
          records.push(record);
        }
        return records;
      } catch (error) {
        if (error instanceof LaneAbort || error instanceof RunCancelledError || signal?.aborted) {
          throw new LaneAbort("Run cancelled");
        }
        if (attempt >= maxFetchAttempts) {
          throw error;
        }

        let delayMs: number;
        if (error instanceof RateLimitedError) {
          delayMs = error.retryAfterSeconds * 1000;
          if (delayMs > this.settings.maxRateLimitWaitMs) {
            throw error;
          }
        } else if (error instanceof TransientFetchError) {
          delayMs = this.backoff(attempt);
        } else {
          throw error;
        }

        logger.warn(
          `${lane.source.source}/${lane.metricType} fetch attempt ${attempt}/${maxFetchAttempts} failed, ` +
            `retrying in ${delayMs}ms: ${describeError(error)}`
        );
        await this.sleep(delayMs, signal);
        if (signal?.aborted) {
          throw new LaneAbort("Run cancelled");
        }
      }
    }
  }

  // ===========================================================================
  // Upload
  // ===========================================================================

  private async uploadWithRetry(
    name: string,
    measurement: Measurement,
    signal?: AbortSignal
  ): Promise<UploadResult> {
    const { maxUploadAttempts, maxRateLimitWaitMs } = this.settings;

    for (let attempt = 1; ; attempt++) {
      try {
        await this.sink.upload(measurement);
        return { kind: "uploaded" };
      } catch (error) {
        const message = describeError(error);

        if (error instanceof DuplicateRejected) {
          return { kind: "duplicate" };
        }
        if (error instanceof PermanentUploadError || error instanceof ValidationError) {
          return { kind: "failed", message, fatal: false, rateLimited: false };
        }
        if (error instanceof RateLimitedError) {
          const waitMs = error.retryAfterSeconds * 1000;
          if (waitMs > maxRateLimitWaitMs) {
            return { kind: "failed", message, fatal: true, rateLimited: true };
          }
          logger.warn(`[${name}] Rate limited, pausing ${waitMs}ms`);
          await this.sleep(waitMs, signal);
          return { kind: "failed", message, fatal: false, rateLimited: true };
        }
        if (error instanceof TransientUploadError && attempt < maxUploadAttempts) {
          const delayMs = this.backoff(attempt);
          logger.warn(
            `[${name}] Upload attempt ${attempt}/${maxUploadAttempts} failed, retrying in ${delayMs}ms: ${message}`
          );
          await this.sleep(delayMs, signal);
          continue;
        }
        // Exhausted transient retries, lost credentials or anything unexpected
        return { kind: "failed", message, fatal: true, rateLimited: false };
      }
    }
  }

  private backoff(attempt: number): number {
    return this.settings.retryBaseDelayMs * 2 ** (attempt - 1);
  }
}

type UploadResult =
  | { kind: "uploaded" }
  | { kind: "duplicate" }
  | { kind: "failed"; message: string; fatal: boolean; rateLimited: boolean };
