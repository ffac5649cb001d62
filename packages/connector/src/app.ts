/**
 * Composition root
 *
 * Wires a validated AppConfig into the state backend, per-service rate
 * limiters and clients, the sources, the Garmin sink and the orchestrator.
 */

import type { AppConfig } from "./lib/config.js";
import {
  FileCredentialsVault,
  PgCredentialsVault,
  type CredentialsVault,
} from "./lib/credentials-vault.js";
import { ConfigurationError, type ServiceName } from "./lib/errors.js";
import type { FetchLike } from "./lib/http.js";
import { setLogLevel, setLogTimeZone, setupLogger } from "./lib/logger.js";
import { RateLimiter } from "./lib/rate-limiter.js";
import { FileRunLock } from "./lib/run-lock.js";
import { FileWatermarkStore, type WatermarkStore } from "./db/watermark-store.js";
import { PgWatermarkStore } from "./db/pg-watermark-store.js";
import { MigrationOrchestrator } from "./migration/orchestrator.js";
import { RunReporter } from "./migration/run-reporter.js";
import { FitbitClient } from "./services/fitbit/api-client.js";
import { FitbitSource } from "./services/fitbit/source.js";
import { GarminClient } from "./services/garmin-connect/api-client.js";
import { GarminSink } from "./services/garmin-connect/sink.js";
import { OmronClient } from "./services/omron-connect/api-client.js";
import { OmronSource } from "./services/omron-connect/source.js";
import type { MeasurementSource } from "./services/types.js";

const logger = setupLogger("app");

export interface App {
  config: AppConfig;
  orchestrator: MigrationOrchestrator;
  reporter: RunReporter;
  watermarks: WatermarkStore;
}

export interface CreateAppOptions {
  /** fetch replacement shared by every client */
  fetchImpl?: FetchLike;
}

interface StateBackend {
  watermarks: WatermarkStore;
  vault: CredentialsVault;
}

async function openState(config: AppConfig): Promise<StateBackend> {
  if (config.stateBackend === "file") {
    return {
      watermarks: new FileWatermarkStore(config.dataDir),
      vault: new FileCredentialsVault(config.dataDir),
    };
  }

  if (!config.databaseUrl) {
    throw new ConfigurationError(["DIRECT_DATABASE_URL: required when STATE_BACKEND=postgres"]);
  }
  const watermarks = new PgWatermarkStore(config.databaseUrl);
  await watermarks.ensureSchema();
  return { watermarks, vault: new PgCredentialsVault(config.databaseUrl) };
}

function createLimiters(config: AppConfig): Record<ServiceName, RateLimiter> {
  return {
    fitbit: new RateLimiter({ name: "fitbit", ...config.rateLimits.fitbit }),
    omron: new RateLimiter({ name: "omron", ...config.rateLimits.omron }),
    garmin: new RateLimiter({ name: "garmin", ...config.rateLimits.garmin }),
  };
}

/**
 * Sources enabled by the configuration, in lane order.
 */
export function buildSources(
  config: AppConfig,
  vault: CredentialsVault,
  limiters: Record<ServiceName, RateLimiter>,
  fetchImpl?: FetchLike
): MeasurementSource[] {
  const sources: MeasurementSource[] = [];

  if (config.fitbit) {
    const client = new FitbitClient({ config: config.fitbit, vault, limiter: limiters.fitbit, fetchImpl });
    sources.push(new FitbitSource(client, config.fitbit));
  }
  if (config.omron) {
    const client = new OmronClient({ config: config.omron, vault, limiter: limiters.omron, fetchImpl });
    sources.push(new OmronSource(client, config.omron));
  }

  return sources;
}

export async function createApp(config: AppConfig, options: CreateAppOptions = {}): Promise<App> {
  setLogLevel(config.logLevel);
  setLogTimeZone(config.timeZone);

  const { watermarks, vault } = await openState(config);
  const limiters = createLimiters(config);

  const sources = buildSources(config, vault, limiters, options.fetchImpl);
  if (sources.length === 0) {
    logger.warn("No source configured: set FITBIT_* or OMRON_* variables");
  } else {
    logger.info(`Sources: ${sources.map((s) => s.source).join(", ")} (state: ${config.stateBackend})`);
  }

  const sink = new GarminSink(
    new GarminClient({ config: config.garmin, vault, limiter: limiters.garmin, fetchImpl: options.fetchImpl })
  );

  const reporter = new RunReporter({ timeZone: config.timeZone, dataDir: config.dataDir });
  await reporter.load();

  const orchestrator = new MigrationOrchestrator({
    sources,
    sink,
    watermarks,
    lock: new FileRunLock(config.dataDir),
    reporter,
    settings: config.migration,
  });

  return { config, orchestrator, reporter, watermarks };
}
