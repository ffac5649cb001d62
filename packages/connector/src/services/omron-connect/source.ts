/**
 * OMRON connect measurement source
 *
 * Blood pressure readings from the sync endpoint. A reading carries
 * systolic, diastolic and pulse together; Omron has no record ids, so each
 * measurement is keyed by metric type and reading minute.
 */

import type { OmronConfig } from "../../lib/config.js";
import { setupLogger } from "../../lib/logger.js";
import {
  BLOOD_PRESSURE_METRICS,
  createMeasurement,
  downloadFloor,
  deriveRecordId,
  type Measurement,
  type MeasurementSource,
  type MetricType,
  type Quantity,
  type Unit,
} from "../types.js";
import type { OmronBpReading, OmronClient } from "./api-client.js";

const logger = setupLogger("omron-source");

type BpMetric = (typeof BLOOD_PRESSURE_METRICS)[number];

/** Outside a run, lanes asking within this window share a download */
const READINGS_TTL_MS = 60 * 1000;

/** Unit codes of the sync endpoint */
const PRESSURE_UNITS: Record<number, Unit> = { 0: "mmHg", 1: "kPa" };

interface ParsedReading {
  recordedAt: Date;
  utcOffsetMinutes: number;
  values: Partial<Record<BpMetric, Quantity>>;
  notes?: string;
}

function toNumber(value: number | string | undefined): number {
  return value === undefined || value === "" ? NaN : Number(value);
}

function flag(value: number | string | undefined, fallback: boolean): boolean {
  const n = toNumber(value);
  return isNaN(n) ? fallback : n !== 0;
}

/**
 * Notes for Garmin: the user's own note followed by the device flags.
 */
export function buildNotes(reading: OmronBpReading): string | undefined {
  const parts: string[] = [];
  const own = reading.notes?.trim();
  if (own) parts.push(own);
  if (flag(reading.movementDetect, false)) parts.push("Body Movement detected");
  if (flag(reading.irregularHB, false)) parts.push("Irregular heartbeat detected");
  if (!flag(reading.cuffWrapDetect, true)) parts.push("Cuff wrap error");
  return parts.length > 0 ? parts.join(", ") : undefined;
}

export class OmronSource implements MeasurementSource {
  readonly source = "OMRON" as const;
  readonly metricTypes: readonly MetricType[] = BLOOD_PRESSURE_METRICS;

  private cache: { fetchedAt: number; lastSyncedTime: number; readings: Promise<OmronBpReading[]> } | null =
    null;
  /** Lower edge of the current run's download, set by beginRun */
  private runFloor: Date | null = null;

  constructor(
    private readonly client: OmronClient,
    private readonly config: OmronConfig,
    private readonly now: () => number = Date.now
  ) {}

  async authenticate(): Promise<void> {
    await this.client.ensureToken();
  }

  /** The run's download asks for readings synced after downloadFloor */
  beginRun(watermarks: ReadonlyMap<MetricType, Date>): void {
    this.runFloor = downloadFloor(watermarks);
    this.cache = null;
  }

  async *fetchSince(metricType: MetricType, since: Date, signal?: AbortSignal): AsyncIterable<Measurement> {
    const metric = this.asBpMetric(metricType);
    if (metric === null) {
      return;
    }

    const floor = this.runFloor;
    const lowerBound = floor !== null && floor.getTime() > since.getTime() ? floor : since;
    const readings = await this.loadReadings((floor ?? since).getTime(), signal);
    const parsed = readings
      .map((reading) => this.parse(reading))
      .filter((r): r is ParsedReading => r !== null)
      .sort((a, b) => a.recordedAt.getTime() - b.recordedAt.getTime());

    for (const reading of parsed) {
      if (reading.recordedAt.getTime() <= lowerBound.getTime()) {
        continue;
      }
      const own = reading.values[metric];
      if (!own) {
        continue;
      }

      const companions: Partial<Record<MetricType, Quantity>> = { ...reading.values };
      delete companions[metric];

      yield createMeasurement({
        source: this.source,
        metricType: metric,
        value: own.value,
        unit: own.unit,
        recordedAt: reading.recordedAt,
        sourceRecordId: deriveRecordId(metric, reading.recordedAt),
        utcOffsetMinutes: reading.utcOffsetMinutes,
        companions,
        ...(reading.notes ? { notes: reading.notes } : {}),
      });
    }
  }

  private loadReadings(lastSyncedTime: number, signal?: AbortSignal): Promise<OmronBpReading[]> {
    const now = this.now();
    const cached = this.cache;
    if (
      cached &&
      cached.lastSyncedTime === lastSyncedTime &&
      (this.runFloor !== null || now - cached.fetchedAt < READINGS_TTL_MS)
    ) {
      return cached.readings;
    }

    const readings = this.client.getBloodPressureReadings({ lastSyncedTime, ...(signal ? { signal } : {}) });
    const entry = { fetchedAt: now, lastSyncedTime, readings };
    this.cache = entry;
    void readings.catch(() => {
      // A failed download must not be served to the next lane
      if (this.cache === entry) this.cache = null;
    });
    return readings;
  }

  private asBpMetric(metricType: MetricType): BpMetric | null {
    return metricType === "SYSTOLIC" || metricType === "DIASTOLIC" || metricType === "PULSE"
      ? metricType
      : null;
  }

  /**
   * @returns null for readings this account should not migrate
   */
  private parse(reading: OmronBpReading): ParsedReading | null {
    const measuredAt = toNumber(reading.measurementDate);
    if (!Number.isFinite(measuredAt)) {
      logger.warn("Skipping reading without a measurement date");
      return null;
    }
    const recordedAt = new Date(measuredAt);

    if (flag(reading.isManualEntry, false)) {
      logger.debug(`Skipping manual entry at ${recordedAt.toISOString()}`);
      return null;
    }

    const userNumber = this.config.userNumber;
    if (userNumber !== -1 && toNumber(reading.userNumberInDevice) !== userNumber) {
      logger.debug(`Skipping reading of device user ${reading.userNumberInDevice}`);
      return null;
    }

    const values: Partial<Record<BpMetric, Quantity>> = {};
    const systolicUnit = PRESSURE_UNITS[toNumber(reading.systolicUnit)] ?? "mmHg";
    const diastolicUnit = PRESSURE_UNITS[toNumber(reading.diastolicUnit)] ?? "mmHg";
    const systolic = toNumber(reading.systolic);
    const diastolic = toNumber(reading.diastolic);
    const pulse = toNumber(reading.pulse);

    if (systolic > 0) values.SYSTOLIC = { value: systolic, unit: systolicUnit };
    if (diastolic > 0) values.DIASTOLIC = { value: diastolic, unit: diastolicUnit };
    if (pulse > 0) values.PULSE = { value: pulse, unit: "bpm" };

    const offsetSeconds = toNumber(reading.timeZone);
    const notes = buildNotes(reading);

    return {
      recordedAt,
      utcOffsetMinutes: Number.isFinite(offsetSeconds) ? Math.round(offsetSeconds / 60) : 0,
      values,
      ...(notes ? { notes } : {}),
    };
  }
}
