/**
 * Garmin Connect measurement sink
 *
 * Garmin stores whole readings, not single metrics. The sink rebuilds the
 * reading from a measurement and its companions, checks whether Garmin
 * already holds a reading at that minute, and writes it when it does not.
 * The check and the write run under one per-client lock, so the sibling
 * lanes of a reading see it as a duplicate.
 */

import { SerialQueue } from "../../lib/durable-file.js";
import { DuplicateRejected, PermanentUploadError } from "../../lib/errors.js";
import { setupLogger } from "../../lib/logger.js";
import { DAY_MS, formatDate, formatLocalIso, sameMinute } from "../../lib/time.js";
import {
  isBloodPressureMetric,
  type Measurement,
  type MeasurementSink,
  type MetricType,
  type UploadOutcome,
} from "../types.js";
import type { GarminClient, GarminBpPayload } from "./api-client.js";
import { encodeWeightFile } from "./fit-encoder.js";

const logger = setupLogger("garmin-sink");

/** Value of a metric from the measurement itself or one of its companions */
function valueOf(measurement: Measurement, metricType: MetricType): number | null {
  if (measurement.metricType === metricType) {
    return measurement.value;
  }
  return measurement.companions[metricType]?.value ?? null;
}

/** Local dates of the day before and the day after the reading */
function searchRange(measurement: Measurement): [string, string] {
  const at = measurement.recordedAt.getTime();
  const offset = measurement.utcOffsetMinutes;
  return [formatDate(new Date(at - DAY_MS), offset), formatDate(new Date(at + DAY_MS), offset)];
}

function label(measurement: Measurement): string {
  return `${measurement.source}/${measurement.metricType} at ${measurement.recordedAt.toISOString()}`;
}

export class GarminSink implements MeasurementSink {
  readonly name = "garmin";

  private readonly writeLock = new SerialQueue();

  constructor(private readonly client: GarminClient) {}

  async authenticate(): Promise<void> {
    await this.client.ensureToken();
  }

  upload(measurement: Measurement): Promise<UploadOutcome> {
    return this.writeLock.run(async () => {
      if (isBloodPressureMetric(measurement.metricType)) {
        await this.uploadBloodPressure(measurement);
      } else {
        await this.uploadBodyComposition(measurement);
      }
      return { accepted: true };
    });
  }

  private async uploadBloodPressure(measurement: Measurement): Promise<void> {
    const systolic = valueOf(measurement, "SYSTOLIC");
    const diastolic = valueOf(measurement, "DIASTOLIC");
    const pulse = valueOf(measurement, "PULSE");
    if (systolic === null || diastolic === null || pulse === null) {
      throw new PermanentUploadError(
        `Incomplete blood pressure reading for ${label(measurement)}`
      );
    }

    const [startDate, endDate] = searchRange(measurement);
    const existing = await this.client.listBloodPressure(startDate, endDate);
    const duplicate = existing.some((m) =>
      sameMinute(new Date(`${m.measurementTimestampGMT}Z`), measurement.recordedAt)
    );
    if (duplicate) {
      throw new DuplicateRejected(`Garmin already has a blood pressure reading for ${label(measurement)}`);
    }

    const payload: GarminBpPayload = {
      measurementTimestampLocal: formatLocalIso(measurement.recordedAt, measurement.utcOffsetMinutes),
      measurementTimestampGMT: formatLocalIso(measurement.recordedAt, 0),
      systolic: Math.round(systolic),
      diastolic: Math.round(diastolic),
      pulse: Math.round(pulse),
      sourceType: "MANUAL",
      notes: measurement.notes ?? "",
    };
    await this.client.addBloodPressure(payload);

    logger.info(
      `Uploaded blood pressure ${payload.systolic}/${payload.diastolic} pulse ${payload.pulse} for ${measurement.recordedAt.toISOString()}`
    );
  }

  private async uploadBodyComposition(measurement: Measurement): Promise<void> {
    const weightKg = valueOf(measurement, "WEIGHT");
    if (weightKg === null) {
      throw new PermanentUploadError(`Weigh-in without weight for ${label(measurement)}`);
    }

    const [startDate, endDate] = searchRange(measurement);
    const existing = await this.client.listWeighIns(startDate, endDate);
    const duplicate = existing.some((w) => {
      const ms = w.timestampGMT ?? w.date;
      return ms !== undefined && sameMinute(new Date(ms), measurement.recordedAt);
    });
    if (duplicate) {
      throw new DuplicateRejected(`Garmin already has a weigh-in for ${label(measurement)}`);
    }

    const file = encodeWeightFile({
      timestamp: measurement.recordedAt,
      weightKg,
      percentFat: valueOf(measurement, "BODY_FAT"),
      bmi: valueOf(measurement, "BMI"),
    });
    const stamp = measurement.recordedAt.toISOString().replace(/[-:]/g, "").slice(0, 15);
    await this.client.uploadFit(file, `weight_${stamp}.fit`);

    logger.info(`Uploaded weigh-in ${weightKg} kg for ${measurement.recordedAt.toISOString()}`);
  }
}
