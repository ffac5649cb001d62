/**
 * Fitbit measurement source
 *
 * Body composition from the weight log. One weigh-in carries weight, BMI and
 * body fat together; within a run the three metric lanes share one download
 * and each picks its field.
 *
 * Log times are local to the user. They are turned into instants with the
 * profile's current UTC offset, so readings taken on the other side of a
 * daylight saving change land one hour off.
 */

import type { FitbitConfig } from "../../lib/config.js";
import { DAY_MS, formatDate, localToUtc } from "../../lib/time.js";
import { setupLogger } from "../../lib/logger.js";
import {
  BODY_COMPOSITION_METRICS,
  createMeasurement,
  downloadFloor,
  type Measurement,
  type MeasurementSource,
  type MetricType,
  type Quantity,
  type Unit,
} from "../types.js";
import type { FitbitClient, FitbitWeightLog } from "./api-client.js";

const logger = setupLogger("fitbit-source");

/** The weight log endpoint accepts at most 31 days per request */
export const WINDOW_DAYS = 30;
const DEFAULT_LOG_TIME = "08:00:00";

type BodyMetric = (typeof BODY_COMPOSITION_METRICS)[number];

function addDays(date: string, days: number): string {
  return new Date(Date.parse(`${date}T00:00:00Z`) + days * DAY_MS).toISOString().slice(0, 10);
}

function positive(value: number | undefined): number | null {
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : null;
}

export class FitbitSource implements MeasurementSource {
  readonly source = "FITBIT" as const;
  readonly metricTypes: readonly MetricType[] = BODY_COMPOSITION_METRICS;

  private utcOffsetMinutes: number | null = null;
  /** Lower edge of the current run's download, set by beginRun */
  private runFloor: Date | null = null;
  private download: { startDay: string; logs: Promise<FitbitWeightLog[]> } | null = null;

  constructor(
    private readonly client: FitbitClient,
    private readonly config: FitbitConfig,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Load or refresh the token and read the profile's UTC offset, which turns
   * the log's local date/time into instants.
   */
  async authenticate(): Promise<void> {
    await this.client.ensureToken();
    if (this.utcOffsetMinutes === null) {
      const profile = await this.client.getProfile();
      this.utcOffsetMinutes = Math.round((profile.user.offsetFromUTCMillis ?? 0) / 60000);
      logger.debug(`Profile UTC offset: ${this.utcOffsetMinutes} min`);
    }
  }

  /**
   * The run's download starts on the day of downloadFloor, so a metric the
   * scale never reports (body fat) does not re-walk the whole history.
   */
  beginRun(watermarks: ReadonlyMap<MetricType, Date>): void {
    this.runFloor = downloadFloor(watermarks);
    this.download = null;
  }

  async *fetchSince(metricType: MetricType, since: Date, signal?: AbortSignal): AsyncIterable<Measurement> {
    const metric = this.asBodyMetric(metricType);
    if (metric === null) {
      return;
    }
    if (this.utcOffsetMinutes === null) {
      await this.authenticate();
    }
    const offset = this.utcOffsetMinutes ?? 0;

    const floor = this.runFloor;
    const lowerBound = floor !== null && floor.getTime() > since.getTime() ? floor : since;
    const logs = await this.weightLogs(this.startDay(floor ?? since, offset), offset, signal);

    const measurements = logs
      .map((log) => this.toMeasurement(metric, log, offset))
      .filter((m): m is Measurement => m !== null && m.recordedAt.getTime() > lowerBound.getTime())
      .sort((a, b) => a.recordedAt.getTime() - b.recordedAt.getTime());

    for (const measurement of measurements) {
      yield measurement;
    }
  }

  private startDay(from: Date, offset: number): string {
    const day = formatDate(from, offset);
    return day > this.config.historyStart ? day : this.config.historyStart;
  }

  /**
   * Logs from startDay to today. Inside a run, lanes asking for the same
   * start share one download.
   */
  private weightLogs(startDay: string, offset: number, signal?: AbortSignal): Promise<FitbitWeightLog[]> {
    if (this.runFloor !== null && this.download?.startDay === startDay) {
      return this.download.logs;
    }

    const logs = this.walkWindows(startDay, formatDate(new Date(this.now()), offset), signal);
    if (this.runFloor !== null) {
      const entry = { startDay, logs };
      this.download = entry;
      void logs.catch(() => {
        // A failed download must not be served to a retry
        if (this.download === entry) this.download = null;
      });
    }
    return logs;
  }

  private async walkWindows(startDay: string, today: string, signal?: AbortSignal): Promise<FitbitWeightLog[]> {
    const logs: FitbitWeightLog[] = [];
    let windowStart = startDay;

    while (windowStart <= today) {
      const candidateEnd = addDays(windowStart, WINDOW_DAYS - 1);
      const windowEnd = candidateEnd < today ? candidateEnd : today;

      logs.push(...(await this.client.getWeightLogs(windowStart, windowEnd, signal)));
      windowStart = addDays(windowEnd, 1);
    }

    logger.debug(`Downloaded ${logs.length} weight logs since ${startDay}`);
    return logs;
  }

  private asBodyMetric(metricType: MetricType): BodyMetric | null {
    return metricType === "WEIGHT" || metricType === "BMI" || metricType === "BODY_FAT"
      ? metricType
      : null;
  }

  private weightUnit(): Unit {
    return this.config.unitSystem === "en_US" ? "lb" : "kg";
  }

  private quantities(log: FitbitWeightLog): Partial<Record<BodyMetric, Quantity>> {
    const result: Partial<Record<BodyMetric, Quantity>> = {};
    const weight = positive(log.weight);
    const bmi = positive(log.bmi);
    const fat = positive(log.fat) ?? positive(log.body_fat);

    if (weight !== null) result.WEIGHT = { value: weight, unit: this.weightUnit() };
    if (bmi !== null) result.BMI = { value: bmi, unit: "kg/m2" };
    if (fat !== null) result.BODY_FAT = { value: fat, unit: "percent" };
    return result;
  }

  private toMeasurement(metric: BodyMetric, log: FitbitWeightLog, offset: number): Measurement | null {
    const all = this.quantities(log);
    const own = all[metric];
    if (!own) {
      return null;
    }

    const companions: Partial<Record<MetricType, Quantity>> = { ...all };
    delete companions[metric];

    return createMeasurement({
      source: this.source,
      metricType: metric,
      value: own.value,
      unit: own.unit,
      recordedAt: localToUtc(log.date, log.time ?? DEFAULT_LOG_TIME, offset),
      sourceRecordId: String(log.logId),
      utcOffsetMinutes: offset,
      companions,
    });
  }
}
