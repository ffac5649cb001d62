import { describe, it, expect } from "vitest";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_MIGRATION_SETTINGS, DEFAULT_RATE_LIMITS, loadConfig } from "./config.js";

function configError(env: NodeJS.ProcessEnv): ConfigurationError {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected loadConfig to throw");
}

describe("loadConfig", () => {
  it("should apply defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config.syncIntervalHours).toBe(6);
    expect(config.timeZone).toBe("UTC");
    expect(config.logLevel).toBe("info");
    expect(config.dataDir).toBe("./data");
    expect(config.stateBackend).toBe("file");
    expect(config.databaseUrl).toBeNull();
    expect(config.statusPort).toBe(5070);
    expect(config.fitbit).toBeNull();
    expect(config.omron).toBeNull();
    expect(config.garmin).toEqual({
      accessToken: null,
      refreshToken: null,
      clientId: null,
      clientSecret: null,
    });
    expect(config.rateLimits).toEqual(DEFAULT_RATE_LIMITS);
    expect(config.migration).toEqual(DEFAULT_MIGRATION_SETTINGS);
  });

  it("should treat blank values as unset", () => {
    const config = loadConfig({ SYNC_INTERVAL_HOURS: "", OMRON_EMAIL: "  ", TZ: "" });

    expect(config.syncIntervalHours).toBe(6);
    expect(config.timeZone).toBe("UTC");
    expect(config.omron).toBeNull();
  });

  it("should enable Fitbit when client id and secret are set", () => {
    const config = loadConfig({
      FITBIT_CLIENT_ID: "test-client",
      FITBIT_CLIENT_SECRET: "test-secret",
      FITBIT_REFRESH_TOKEN: "test-refresh",
      FITBIT_UNIT_SYSTEM: "en_US",
    });

    expect(config.fitbit).toEqual({
      clientId: "test-client",
      clientSecret: "test-secret",
      refreshToken: "test-refresh",
      unitSystem: "en_US",
      historyStart: "2000-01-01",
    });
  });

  it("should enable Omron with an upper-cased country code", () => {
    const config = loadConfig({
      OMRON_EMAIL: "user@example.com",
      OMRON_PASSWORD: "test-password",
      OMRON_COUNTRY_CODE: "de",
      OMRON_USER_NUMBER: "2",
    });

    expect(config.omron).toEqual({
      email: "user@example.com",
      password: "test-password",
      countryCode: "DE",
      userNumber: 2,
    });
  });

  it("should parse numbers and log levels", () => {
    const config = loadConfig({
      SYNC_INTERVAL_HOURS: "24",
      STATUS_PORT: "8080",
      LOG_LEVEL: "DEBUG",
      TZ: "Europe/Berlin",
    });

    expect(config.syncIntervalHours).toBe(24);
    expect(config.statusPort).toBe(8080);
    expect(config.logLevel).toBe("debug");
    expect(config.timeZone).toBe("Europe/Berlin");
  });

  it("should collect every invalid variable", () => {
    const error = configError({
      SYNC_INTERVAL_HOURS: "0",
      TZ: "Mars/Olympus",
      LOG_LEVEL: "verbose",
      STATE_BACKEND: "sqlite",
    });

    expect(error.issues).toHaveLength(4);
    expect(error.issues.map((issue) => issue.split(":")[0])).toEqual([
      "SYNC_INTERVAL_HOURS",
      "TZ",
      "LOG_LEVEL",
      "STATE_BACKEND",
    ]);
  });

  it("should require a database URL for the postgres backend", () => {
    const error = configError({ STATE_BACKEND: "postgres" });

    expect(error.issues).toEqual([
      "DIRECT_DATABASE_URL: is required when STATE_BACKEND=postgres",
    ]);
  });

  it("should reject partially configured providers", () => {
    const error = configError({
      FITBIT_CLIENT_ID: "test-client",
      OMRON_EMAIL: "user@example.com",
    });

    expect(error.issues).toEqual([
      "FITBIT_CLIENT_ID: FITBIT_CLIENT_ID and FITBIT_CLIENT_SECRET must be set together",
      "OMRON_EMAIL: OMRON_EMAIL, OMRON_PASSWORD and OMRON_COUNTRY_CODE must be set together",
    ]);
  });

  it("should reject a malformed history start", () => {
    const error = configError({ FITBIT_HISTORY_START: "01/01/2020" });

    expect(error.issues).toEqual(["FITBIT_HISTORY_START: must be YYYY-MM-DD"]);
  });
});
