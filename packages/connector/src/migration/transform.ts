/**
 * Measurement transform
 *
 * Converts provider units into the units Garmin stores and rejects values
 * outside the plausible range of their metric. Companions are converted
 * with the measurement; an implausible companion is dropped rather than
 * failing the record.
 */

import type { PlausibleRange } from "../lib/config.js";
import { ValidationError } from "../lib/errors.js";
import {
  createMeasurement,
  METRIC_TYPES,
  type Measurement,
  type MetricType,
  type Quantity,
  type Unit,
} from "../services/types.js";

export const LB_TO_KG = 0.45359237;
export const KPA_TO_MMHG = 7.50061683;

export const CANONICAL_UNITS: Record<MetricType, Unit> = {
  WEIGHT: "kg",
  BMI: "kg/m2",
  BODY_FAT: "percent",
  SYSTOLIC: "mmHg",
  DIASTOLIC: "mmHg",
  PULSE: "bpm",
};

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Convert a quantity to the canonical unit of its metric.
 *
 * @throws ValidationError for a unit that does not belong to the metric
 */
export function toCanonical(metricType: MetricType, quantity: Quantity): Quantity {
  const target = CANONICAL_UNITS[metricType];
  if (quantity.unit === target) {
    return quantity;
  }

  if (target === "kg" && quantity.unit === "lb") {
    return { value: round(quantity.value * LB_TO_KG, 2), unit: "kg" };
  }
  if (target === "mmHg" && quantity.unit === "kPa") {
    return { value: Math.round(quantity.value * KPA_TO_MMHG), unit: "mmHg" };
  }

  throw new ValidationError(`Cannot convert ${metricType} from ${quantity.unit} to ${target}`);
}

/**
 * @throws ValidationError when the value is not finite or out of range
 */
export function checkPlausible(metricType: MetricType, value: number, range: PlausibleRange): void {
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${metricType} value ${value} is not a number`);
  }
  if (value < range.min || value > range.max) {
    throw new ValidationError(
      `${metricType} value ${value} outside plausible range ${range.min}-${range.max}`
    );
  }
}

/**
 * Normalize a fetched measurement for upload.
 *
 * @throws ValidationError when the measurement's own value is unusable
 */
export function normalizeMeasurement(
  measurement: Measurement,
  ranges: Record<MetricType, PlausibleRange>
): Measurement {
  const own = toCanonical(measurement.metricType, {
    value: measurement.value,
    unit: measurement.unit,
  });
  checkPlausible(measurement.metricType, own.value, ranges[measurement.metricType]);

  const companions: Partial<Record<MetricType, Quantity>> = {};
  for (const metricType of METRIC_TYPES) {
    const quantity = measurement.companions[metricType];
    if (!quantity) {
      continue;
    }
    try {
      const canonical = toCanonical(metricType, quantity);
      checkPlausible(metricType, canonical.value, ranges[metricType]);
      companions[metricType] = canonical;
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      // The sink decides whether the reading is complete enough
    }
  }

  return createMeasurement({
    ...measurement,
    value: own.value,
    unit: own.unit,
    companions,
  });
}

