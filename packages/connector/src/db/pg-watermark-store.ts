/**
 * PostgreSQL watermark store
 *
 * Rows live in migration.watermarks (see schema.sql). Each advance is one
 * guarded upsert: the row only changes when the new timestamp is not older
 * than the stored one, so a committed statement never moves a lane back.
 */

import pg from "pg";
import { readFile } from "node:fs/promises";
import { WatermarkRegressionError } from "../lib/errors.js";
import { setupLogger } from "../lib/logger.js";
import { METRIC_TYPES, SOURCES, type MetricType, type Source } from "../services/types.js";
import { checkAdvance, defaultWatermark, type Watermark, type WatermarkStore } from "./watermark-store.js";

const { Client } = pg;

const logger = setupLogger("pg-watermark-store");

const SCHEMA_FILE = new URL("./schema.sql", import.meta.url);

interface WatermarkRow {
  source: string;
  metric_type: string;
  last_migrated_at: Date;
  last_source_record_id: string | null;
}

function isSource(value: string): value is Source {
  const sources: readonly string[] = SOURCES;
  return sources.includes(value);
}

function isMetricType(value: string): value is MetricType {
  const metricTypes: readonly string[] = METRIC_TYPES;
  return metricTypes.includes(value);
}

export class PgWatermarkStore implements WatermarkStore {
  constructor(private readonly databaseUrl: string) {}

  private getDbConnection(): pg.Client {
    return new Client({ connectionString: this.databaseUrl });
  }

  /**
   * Create the migration schema and tables when missing.
   */
  async ensureSchema(): Promise<void> {
    const sql = await readFile(SCHEMA_FILE, "utf8");
    const client = this.getDbConnection();

    try {
      await client.connect();
      await client.query(sql);
      logger.debug("Schema ensured");
    } finally {
      await client.end();
    }
  }

  async get(source: Source, metricType: MetricType): Promise<Watermark> {
    const client = this.getDbConnection();

    try {
      await client.connect();

      const result = await client.query<WatermarkRow>(
        `SELECT source, metric_type, last_migrated_at, last_source_record_id
         FROM migration.watermarks
         WHERE source = $1 AND metric_type = $2`,
        [source, metricType]
      );

      const row = result.rows[0];
      if (!row) {
        return defaultWatermark(source, metricType);
      }
      return {
        source,
        metricType,
        lastMigratedAt: new Date(row.last_migrated_at),
        lastSourceRecordId: row.last_source_record_id,
      };
    } finally {
      await client.end();
    }
  }

  async advance(
    source: Source,
    metricType: MetricType,
    newTimestamp: Date,
    recordId: string | null
  ): Promise<void> {
    const current = await this.get(source, metricType);
    if (checkAdvance(current, newTimestamp, recordId) === "noop") {
      return;
    }

    const client = this.getDbConnection();

    try {
      await client.connect();

      const result = await client.query(
        `INSERT INTO migration.watermarks
           (source, metric_type, last_migrated_at, last_source_record_id, updated_at)
         VALUES ($1, $2, $3, $4, now())
         ON CONFLICT (source, metric_type) DO UPDATE SET
           last_migrated_at = EXCLUDED.last_migrated_at,
           last_source_record_id = EXCLUDED.last_source_record_id,
           updated_at = EXCLUDED.updated_at
         WHERE migration.watermarks.last_migrated_at <= EXCLUDED.last_migrated_at
         RETURNING source`,
        [source, metricType, newTimestamp.toISOString(), recordId]
      );

      // Another writer moved the row past newTimestamp between get and upsert
      if (result.rowCount === 0) {
        throw new WatermarkRegressionError(
          `Watermark for ${source}/${metricType} is already past ${newTimestamp.toISOString()}`
        );
      }

      logger.debug(`${source}/${metricType} -> ${newTimestamp.toISOString()}`);
    } finally {
      await client.end();
    }
  }

  async list(): Promise<Watermark[]> {
    const client = this.getDbConnection();

    try {
      await client.connect();

      const result = await client.query<WatermarkRow>(
        `SELECT source, metric_type, last_migrated_at, last_source_record_id
         FROM migration.watermarks
         ORDER BY source, metric_type`
      );

      const watermarks: Watermark[] = [];
      for (const row of result.rows) {
        if (!isSource(row.source) || !isMetricType(row.metric_type)) {
          logger.warn(`Ignoring unknown watermark row ${row.source}/${row.metric_type}`);
          continue;
        }
        watermarks.push({
          source: row.source,
          metricType: row.metric_type,
          lastMigratedAt: new Date(row.last_migrated_at),
          lastSourceRecordId: row.last_source_record_id,
        });
      }
      return watermarks;
    } finally {
      await client.end();
    }
  }
}
