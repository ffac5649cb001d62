/**
 * Watermark store
 *
 * Durable "last successfully migrated" marker per (source, metric type).
 * The only writer of watermark rows.
 *
 * Rules enforced by every backend:
 * - get() of an unknown pair returns epoch zero
 * - advance() never moves a watermark backwards (WatermarkRegressionError)
 * - advance() returns only after the write is durable
 */

import path from "node:path";
import { WatermarkRegressionError } from "../lib/errors.js";
import { readJsonFile, SerialQueue, writeJsonDurable } from "../lib/durable-file.js";
import { setupLogger } from "../lib/logger.js";
import {
  METRIC_TYPES,
  SOURCES,
  type MetricType,
  type Source,
} from "../services/types.js";

const logger = setupLogger("watermark-store");

export interface Watermark {
  source: Source;
  metricType: MetricType;
  lastMigratedAt: Date;
  lastSourceRecordId: string | null;
}

export interface WatermarkStore {
  get(source: Source, metricType: MetricType): Promise<Watermark>;
  advance(
    source: Source,
    metricType: MetricType,
    newTimestamp: Date,
    recordId: string | null
  ): Promise<void>;
  /** Rows that have been advanced at least once */
  list(): Promise<Watermark[]>;
}

export const EPOCH = new Date(0);

export function defaultWatermark(source: Source, metricType: MetricType): Watermark {
  return { source, metricType, lastMigratedAt: new Date(EPOCH), lastSourceRecordId: null };
}

export type AdvanceDecision = "write" | "noop";

/**
 * Decide what an advance means against the stored row.
 *
 * @throws WatermarkRegressionError when newTimestamp < stored
 */
export function checkAdvance(
  current: Watermark,
  newTimestamp: Date,
  recordId: string | null
): AdvanceDecision {
  const stored = current.lastMigratedAt.getTime();
  const next = newTimestamp.getTime();

  if (isNaN(next)) {
    throw new WatermarkRegressionError(
      `Invalid watermark timestamp for ${current.source}/${current.metricType}`
    );
  }
  if (next < stored) {
    throw new WatermarkRegressionError(
      `Watermark for ${current.source}/${current.metricType} cannot move back from ` +
        `${current.lastMigratedAt.toISOString()} to ${newTimestamp.toISOString()}`
    );
  }
  if (next === stored && recordId === current.lastSourceRecordId) {
    return "noop";
  }
  return "write";
}

// =============================================================================
// File backend
// =============================================================================

interface StoredRow {
  lastMigratedAt: string;
  lastSourceRecordId: string | null;
}

interface StateDocument {
  version: 1;
  watermarks: Record<string, StoredRow>;
}

function rowKey(source: Source, metricType: MetricType): string {
  return `${source}:${metricType}`;
}

function isStoredRow(value: unknown): value is StoredRow {
  if (typeof value !== "object" || value === null) return false;
  const row: Record<string, unknown> = { ...value };
  return (
    typeof row.lastMigratedAt === "string" &&
    !isNaN(Date.parse(row.lastMigratedAt)) &&
    (row.lastSourceRecordId === null || typeof row.lastSourceRecordId === "string")
  );
}

function parseDocument(data: unknown): StateDocument {
  const doc: StateDocument = { version: 1, watermarks: {} };
  if (typeof data !== "object" || data === null || !("watermarks" in data)) {
    return doc;
  }

  const rows = data.watermarks;
  if (typeof rows !== "object" || rows === null) {
    return doc;
  }

  for (const [key, value] of Object.entries(rows)) {
    if (isStoredRow(value)) {
      doc.watermarks[key] = value;
    } else {
      logger.warn(`Ignoring malformed watermark row ${key}`);
    }
  }
  return doc;
}

/**
 * Watermarks in one JSON document (DATA_DIR/watermarks.json).
 */
export class FileWatermarkStore implements WatermarkStore {
  private readonly filePath: string;
  private readonly queue = new SerialQueue();

  constructor(dataDir: string) {
    this.filePath = path.join(dataDir, "watermarks.json");
  }

  async get(source: Source, metricType: MetricType): Promise<Watermark> {
    const doc = await this.load();
    return this.toWatermark(doc, source, metricType);
  }

  advance(
    source: Source,
    metricType: MetricType,
    newTimestamp: Date,
    recordId: string | null
  ): Promise<void> {
    return this.queue.run(async () => {
      const doc = await this.load();
      const current = this.toWatermark(doc, source, metricType);

      if (checkAdvance(current, newTimestamp, recordId) === "noop") {
        return;
      }

      doc.watermarks[rowKey(source, metricType)] = {
        lastMigratedAt: newTimestamp.toISOString(),
        lastSourceRecordId: recordId,
      };
      await writeJsonDurable(this.filePath, doc);

      logger.debug(`${source}/${metricType} -> ${newTimestamp.toISOString()}`);
    });
  }

  async list(): Promise<Watermark[]> {
    const doc = await this.load();
    const result: Watermark[] = [];
    for (const source of SOURCES) {
      for (const metricType of METRIC_TYPES) {
        if (doc.watermarks[rowKey(source, metricType)]) {
          result.push(this.toWatermark(doc, source, metricType));
        }
      }
    }
    return result;
  }

  private async load(): Promise<StateDocument> {
    return parseDocument(await readJsonFile(this.filePath));
  }

  private toWatermark(doc: StateDocument, source: Source, metricType: MetricType): Watermark {
    const row = doc.watermarks[rowKey(source, metricType)];
    if (!row) {
      return defaultWatermark(source, metricType);
    }
    return {
      source,
      metricType,
      lastMigratedAt: new Date(row.lastMigratedAt),
      lastSourceRecordId: row.lastSourceRecordId,
    };
  }
}
