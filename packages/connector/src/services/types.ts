/**
 * Shared measurement model and the capability interfaces every provider
 * adapter implements. The orchestrator is written against these only.
 */

import { floorToMinute } from "../lib/time.js";

export const SOURCES = ["FITBIT", "OMRON"] as const;
export type Source = (typeof SOURCES)[number];

export const METRIC_TYPES = [
  "WEIGHT",
  "BMI",
  "BODY_FAT",
  "SYSTOLIC",
  "DIASTOLIC",
  "PULSE",
] as const;
export type MetricType = (typeof METRIC_TYPES)[number];

export const BODY_COMPOSITION_METRICS = ["WEIGHT", "BMI", "BODY_FAT"] as const satisfies readonly MetricType[];
export const BLOOD_PRESSURE_METRICS = ["SYSTOLIC", "DIASTOLIC", "PULSE"] as const satisfies readonly MetricType[];

export type Unit = "kg" | "lb" | "kg/m2" | "percent" | "mmHg" | "kPa" | "bpm";

export interface Quantity {
  readonly value: number;
  readonly unit: Unit;
}

export interface Measurement {
  readonly source: Source;
  readonly metricType: MetricType;
  readonly value: number;
  readonly unit: Unit;
  /** UTC instant of the reading */
  readonly recordedAt: Date;
  /** Provider id when it has one, else the minute-derived key */
  readonly sourceRecordId: string;
  /** Offset of the device clock at the time of the reading */
  readonly utcOffsetMinutes: number;
  /** Other values taken in the same reading */
  readonly companions: Readonly<Partial<Record<MetricType, Quantity>>>;
  readonly notes?: string;
}

export interface UploadOutcome {
  accepted: true;
}

export interface MeasurementSource {
  readonly source: Source;
  readonly metricTypes: readonly MetricType[];

  /**
   * Establish or refresh credentials.
   * @throws AuthError when they cannot be refreshed silently
   */
  authenticate(): Promise<void>;

  /**
   * Called once per run, before any lane fetches, with the watermark of
   * every metric this source provides.
   */
  beginRun?(watermarks: ReadonlyMap<MetricType, Date>): void;

  /**
   * Records of one metric with recordedAt > since, ordered by recordedAt.
   * Pagination is handled inside.
   * @throws RunCancelledError when the signal aborts mid-download
   */
  fetchSince(metricType: MetricType, since: Date, signal?: AbortSignal): AsyncIterable<Measurement>;
}

export interface MeasurementSink {
  readonly name: string;

  authenticate(): Promise<void>;

  /**
   * @throws DuplicateRejected when the sink already holds the reading
   */
  upload(measurement: Measurement): Promise<UploadOutcome>;
}

export function isBloodPressureMetric(metricType: MetricType): boolean {
  const bloodPressure: readonly MetricType[] = BLOOD_PRESSURE_METRICS;
  return bloodPressure.includes(metricType);
}

/**
 * Record id for providers without native ids: metric type plus the reading
 * time rounded down to the minute.
 */
export function deriveRecordId(metricType: MetricType, recordedAt: Date): string {
  return `${metricType}@${floorToMinute(recordedAt).toISOString()}`;
}

/**
 * Where a download shared by the metrics of one reading should start: the
 * oldest watermark that has moved, or epoch when none has. A metric still at
 * epoch beside moved siblings is bounded by them, because every earlier
 * reading reached the sink whole through a sibling lane.
 */
export function downloadFloor(watermarks: ReadonlyMap<MetricType, Date>): Date {
  const moved = [...watermarks.values()].map((d) => d.getTime()).filter((t) => t > 0);
  return new Date(moved.length > 0 ? Math.min(...moved) : 0);
}

export function dedupKey(measurement: Measurement): string {
  return `${measurement.metricType}:${measurement.sourceRecordId}`;
}

/**
 * Build an immutable measurement.
 */
export function createMeasurement(fields: Measurement): Measurement {
  return Object.freeze({
    ...fields,
    recordedAt: new Date(fields.recordedAt.getTime()),
    companions: Object.freeze({ ...fields.companions }),
  });
}
