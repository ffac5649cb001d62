/**
 * @repo/connector
 *
 * Migrates Fitbit body composition and Omron Connect blood pressure readings
 * into Garmin Connect, one watermark per (source, metric type).
 */

export { createApp, buildSources, type App, type CreateAppOptions } from "./app.js";

// Migration
export * from "./migration/orchestrator.js";
export * from "./migration/run-reporter.js";
export * from "./migration/transform.js";

// Model and adapters
export * from "./services/types.js";
export { FitbitClient } from "./services/fitbit/api-client.js";
export { FitbitSource } from "./services/fitbit/source.js";
export { OmronClient } from "./services/omron-connect/api-client.js";
export { OmronSource } from "./services/omron-connect/source.js";
export { GarminClient } from "./services/garmin-connect/api-client.js";
export { GarminSink } from "./services/garmin-connect/sink.js";

// State
export * from "./db/watermark-store.js";
export { PgWatermarkStore } from "./db/pg-watermark-store.js";
export * from "./lib/credentials-vault.js";
export * from "./lib/run-lock.js";

// Server
export * from "./server/status.js";

// Lib
export * from "./lib/config.js";
export * from "./lib/errors.js";
export * from "./lib/logger.js";
export { RateLimiter, type RateLimitPolicy } from "./lib/rate-limiter.js";
