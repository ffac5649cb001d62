/**
 * Configuration
 *
 * Environment variables (plus .env for local development) validated once at
 * start-up. Every problem is collected into a single ConfigurationError.
 */

import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigurationError, type ServiceName } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import type { RateLimitPolicy } from "./rate-limiter.js";
import { isValidTimeZone } from "./time.js";
import type { MetricType } from "../services/types.js";

// =============================================================================
// Types
// =============================================================================

export type StateBackend = "file" | "postgres";
export type FitbitUnitSystem = "METRIC" | "en_US";

export interface FitbitConfig {
  clientId: string;
  clientSecret: string;
  /** Seed used when the credentials store has no token yet */
  refreshToken: string | null;
  unitSystem: FitbitUnitSystem;
  /** First day fetched on a fresh watermark (YYYY-MM-DD) */
  historyStart: string;
}

export interface OmronConfig {
  email: string;
  password: string;
  countryCode: string;
  /** Device user slot to keep; -1 keeps every user */
  userNumber: number;
}

export interface GarminConfig {
  accessToken: string | null;
  refreshToken: string | null;
  clientId: string | null;
  clientSecret: string | null;
}

export interface PlausibleRange {
  min: number;
  max: number;
}

export interface MigrationSettings {
  maxFetchAttempts: number;
  maxUploadAttempts: number;
  retryBaseDelayMs: number;
  /** Longest limiter cool-down a lane waits out instead of failing */
  maxRateLimitWaitMs: number;
  plausibleRanges: Record<MetricType, PlausibleRange>;
}

export interface AppConfig {
  syncIntervalHours: number;
  timeZone: string;
  logLevel: LogLevel;
  dataDir: string;
  stateBackend: StateBackend;
  databaseUrl: string | null;
  statusPort: number;
  fitbit: FitbitConfig | null;
  omron: OmronConfig | null;
  garmin: GarminConfig;
  rateLimits: Record<ServiceName, RateLimitPolicy>;
  migration: MigrationSettings;
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_RATE_LIMITS: Record<ServiceName, RateLimitPolicy> = {
  // 150 requests per user per hour
  fitbit: { capacity: 150, refillPerSecond: 150 / 3600 },
  omron: { capacity: 10, refillPerSecond: 1 },
  garmin: { capacity: 5, refillPerSecond: 0.5 },
};

export const DEFAULT_PLAUSIBLE_RANGES: Record<MetricType, PlausibleRange> = {
  WEIGHT: { min: 20, max: 350 },
  BMI: { min: 8, max: 80 },
  BODY_FAT: { min: 1, max: 75 },
  SYSTOLIC: { min: 50, max: 280 },
  DIASTOLIC: { min: 25, max: 180 },
  PULSE: { min: 20, max: 250 },
};

export const DEFAULT_MIGRATION_SETTINGS: MigrationSettings = {
  maxFetchAttempts: 3,
  maxUploadAttempts: 3,
  retryBaseDelayMs: 1000,
  maxRateLimitWaitMs: 5 * 60 * 1000,
  plausibleRanges: DEFAULT_PLAUSIBLE_RANGES,
};

// =============================================================================
// Schema
// =============================================================================

/** dotenv turns `KEY=` into an empty string; treat it as unset */
function blankToUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const logLevelNames = Object.keys(LOG_LEVELS);

const envSchema = z
  .object({
    SYNC_INTERVAL_HOURS: z.preprocess(
      blankToUndefined,
      z.coerce.number().int().min(1).max(24).default(6)
    ),
    TZ: z.preprocess(
      blankToUndefined,
      z
        .string()
        .default("UTC")
        .refine(isValidTimeZone, { message: "must be an IANA time zone" })
    ),
    LOG_LEVEL: z.preprocess(
      blankToUndefined,
      z
        .string()
        .toLowerCase()
        .default("info")
        .refine((value): value is LogLevel => logLevelNames.includes(value), {
          message: `must be one of ${logLevelNames.join(", ")}`,
        })
    ),
    DATA_DIR: z.preprocess(blankToUndefined, z.string().default("./data")),
    STATE_BACKEND: z.preprocess(blankToUndefined, z.enum(["file", "postgres"]).default("file")),
    DIRECT_DATABASE_URL: optionalString,
    STATUS_PORT: z.preprocess(
      blankToUndefined,
      z.coerce.number().int().min(1).max(65535).default(5070)
    ),

    FITBIT_CLIENT_ID: optionalString,
    FITBIT_CLIENT_SECRET: optionalString,
    FITBIT_REFRESH_TOKEN: optionalString,
    FITBIT_UNIT_SYSTEM: z.preprocess(blankToUndefined, z.enum(["METRIC", "en_US"]).default("METRIC")),
    FITBIT_HISTORY_START: z.preprocess(
      blankToUndefined,
      z
        .string()
        .regex(/^\d{4}-\d{2}-\d{2}$/, "must be YYYY-MM-DD")
        .default("2000-01-01")
    ),

    OMRON_EMAIL: optionalString,
    OMRON_PASSWORD: optionalString,
    OMRON_COUNTRY_CODE: z.preprocess(
      blankToUndefined,
      z
        .string()
        .trim()
        .toUpperCase()
        .regex(/^[A-Z]{2}$/, "must be a two-letter country code")
        .optional()
    ),
    OMRON_USER_NUMBER: z.preprocess(blankToUndefined, z.coerce.number().int().min(-1).default(-1)),

    GARMIN_ACCESS_TOKEN: optionalString,
    GARMIN_REFRESH_TOKEN: optionalString,
    GARMIN_CLIENT_ID: optionalString,
    GARMIN_CLIENT_SECRET: optionalString,
  })
  .superRefine((env, ctx) => {
    if (env.STATE_BACKEND === "postgres" && !env.DIRECT_DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DIRECT_DATABASE_URL"],
        message: "is required when STATE_BACKEND=postgres",
      });
    }

    if (Boolean(env.FITBIT_CLIENT_ID) !== Boolean(env.FITBIT_CLIENT_SECRET)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["FITBIT_CLIENT_ID"],
        message: "FITBIT_CLIENT_ID and FITBIT_CLIENT_SECRET must be set together",
      });
    }

    const omronFields = [env.OMRON_EMAIL, env.OMRON_PASSWORD, env.OMRON_COUNTRY_CODE];
    const omronSet = omronFields.filter(Boolean).length;
    if (omronSet > 0 && omronSet < omronFields.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["OMRON_EMAIL"],
        message: "OMRON_EMAIL, OMRON_PASSWORD and OMRON_COUNTRY_CODE must be set together",
      });
    }
  });

// =============================================================================
// Loading
// =============================================================================

/**
 * Validate an environment into the application config.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const e = result.data;

  const fitbit: FitbitConfig | null =
    e.FITBIT_CLIENT_ID && e.FITBIT_CLIENT_SECRET
      ? {
          clientId: e.FITBIT_CLIENT_ID,
          clientSecret: e.FITBIT_CLIENT_SECRET,
          refreshToken: e.FITBIT_REFRESH_TOKEN ?? null,
          unitSystem: e.FITBIT_UNIT_SYSTEM,
          historyStart: e.FITBIT_HISTORY_START,
        }
      : null;

  const omron: OmronConfig | null =
    e.OMRON_EMAIL && e.OMRON_PASSWORD && e.OMRON_COUNTRY_CODE
      ? {
          email: e.OMRON_EMAIL,
          password: e.OMRON_PASSWORD,
          countryCode: e.OMRON_COUNTRY_CODE,
          userNumber: e.OMRON_USER_NUMBER,
        }
      : null;

  return {
    syncIntervalHours: e.SYNC_INTERVAL_HOURS,
    timeZone: e.TZ,
    logLevel: e.LOG_LEVEL,
    dataDir: e.DATA_DIR,
    stateBackend: e.STATE_BACKEND,
    databaseUrl: e.DIRECT_DATABASE_URL ?? null,
    statusPort: e.STATUS_PORT,
    fitbit,
    omron,
    garmin: {
      accessToken: e.GARMIN_ACCESS_TOKEN ?? null,
      refreshToken: e.GARMIN_REFRESH_TOKEN ?? null,
      clientId: e.GARMIN_CLIENT_ID ?? null,
      clientSecret: e.GARMIN_CLIENT_SECRET ?? null,
    },
    rateLimits: DEFAULT_RATE_LIMITS,
    migration: DEFAULT_MIGRATION_SETTINGS,
  };
}

/**
 * Load .env (when present) into process.env, then validate.
 */
export function loadConfigFromEnvironment(): AppConfig {
  loadDotenv();
  return loadConfig(process.env);
}
