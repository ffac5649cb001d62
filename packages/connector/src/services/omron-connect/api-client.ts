/**
 * OMRON connect API Client
 *
 * Email/password login against the regional API server and the blood
 * pressure sync endpoint. Data fetching only, no migration state.
 *
 * Credentials:
 * - OMRON_EMAIL / OMRON_PASSWORD for the initial login
 * - accessToken + refreshToken from the login response are kept in the
 *   credentials vault; an expired access token is renewed with the refresh
 *   token, falling back to a password login when that is rejected
 */

import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";
import { z } from "zod";
import { AuthError, PermanentFetchError } from "../../lib/errors.js";
import type { CredentialsVault } from "../../lib/credentials-vault.js";
import type { OmronConfig } from "../../lib/config.js";
import { readJson, sendRequest, type FetchLike, type RequestContext } from "../../lib/http.js";
import { setupLogger } from "../../lib/logger.js";
import type { RateLimiter } from "../../lib/rate-limiter.js";
import { TokenManager, type TokenSet } from "../../lib/token-manager.js";

const logger = setupLogger("omron-api");

// Configuration
const APP_NAME = "OCM";
const APP_URL = "/app";
const APP_VERSION = "7.20.0";
export const USER_AGENT = `Foresight/${APP_VERSION} (com.omronhealthcare.omronconnect; build:37; iOS 15.8.3) Alamofire/5.9.1`;
const MAX_PAGES = 500;

// =============================================================================
// Regions
// =============================================================================

const regionsSchema = z.object({
  defaultServer: z.string().url(),
  regions: z.array(
    z.object({
      name: z.string(),
      server: z.string().url(),
      countries: z.array(z.string().length(2)),
    })
  ),
});

type RegionTable = z.infer<typeof regionsSchema>;

let regionTable: RegionTable | null = null;

function loadRegions(): RegionTable {
  if (regionTable === null) {
    const raw = readFileSync(new URL("./regions.json", import.meta.url), "utf8");
    regionTable = regionsSchema.parse(JSON.parse(raw));
  }
  return regionTable;
}

/**
 * API server for a country code. Unknown countries use the North America
 * server.
 */
export function serverForCountry(countryCode: string): string {
  const table = loadRegions();
  const code = countryCode.toUpperCase();
  const region = table.regions.find((r) => r.countries.includes(code));
  return region?.server ?? table.defaultServer;
}

// =============================================================================
// Types
// =============================================================================

interface LoginResponse {
  success?: boolean;
  message?: string;
  errorCode?: string;
  accessToken?: string;
  refreshToken?: string;
  expiresIn?: number | string;
}

/** Numeric fields arrive as numbers or numeric strings */
type Numeric = number | string;

export interface OmronBpReading {
  isManualEntry: Numeric;
  userNumberInDevice: Numeric;
  systolic: Numeric;
  systolicUnit: Numeric;
  diastolic: Numeric;
  diastolicUnit: Numeric;
  pulse: Numeric;
  pulseUnit?: Numeric;
  irregularHB?: Numeric;
  movementDetect?: Numeric;
  cuffWrapDetect?: Numeric;
  notes?: string;
  /** Epoch milliseconds */
  measurementDate: Numeric;
  /** Device UTC offset in seconds */
  timeZone?: Numeric;
}

interface BpSyncResponse {
  success?: boolean;
  message?: string;
  errorCode?: string;
  data?: OmronBpReading[];
  nextpaginationKey?: Numeric;
  lastSyncedTime?: Numeric;
}

export interface OmronClientOptions {
  config: OmronConfig;
  vault: CredentialsVault;
  limiter: RateLimiter;
  fetchImpl?: FetchLike;
  now?: () => number;
}

export class OmronClient {
  readonly server: string;
  private readonly config: OmronConfig;
  private readonly tokens: TokenManager;
  private readonly ctx: RequestContext;
  private readonly now: () => number;

  constructor(options: OmronClientOptions) {
    this.config = options.config;
    this.server = serverForCountry(options.config.countryCode);
    this.now = options.now ?? Date.now;
    this.ctx = {
      service: "omron",
      limiter: options.limiter,
      kind: "fetch",
      fetchImpl: options.fetchImpl,
    };
    this.tokens = new TokenManager({
      service: "omron",
      vault: options.vault,
      refresh: (current) => this.login(current),
      thresholdMinutes: 5,
      now: this.now,
    });
  }

  async ensureToken(): Promise<void> {
    await this.tokens.getAccessToken();
  }

  private async login(current: TokenSet | null): Promise<TokenSet> {
    if (current?.refreshToken) {
      try {
        return await this.postLogin({
          app: APP_NAME,
          emailAddress: this.config.email,
          refreshToken: current.refreshToken,
        });
      } catch (error) {
        if (!(error instanceof AuthError)) {
          throw error;
        }
        logger.info("Refresh token rejected, logging in with password");
      }
    }

    return this.postLogin({
      emailAddress: this.config.email,
      app: APP_NAME,
      country: this.config.countryCode,
      password: this.config.password,
    });
  }

  private async postLogin(payload: Record<string, string>): Promise<TokenSet> {
    const body = JSON.stringify(payload);

    let response: Response;
    try {
      response = await sendRequest(
        `${this.server}${APP_URL}/login`,
        {
          method: "POST",
          headers: {
            "user-agent": USER_AGENT,
            "content-type": "application/json",
            "Cache-Control": "no-cache",
            Checksum: createHash("sha256").update(body, "utf8").digest("hex"),
          },
          body,
        },
        this.ctx
      );
    } catch (error) {
      if (error instanceof PermanentFetchError) {
        throw new AuthError("omron", `Login rejected: ${error.message}`, { cause: error });
      }
      throw error;
    }

    const data = await readJson<LoginResponse>(response, this.ctx);
    if (data.success === false || !data.accessToken) {
      throw new AuthError(
        "omron",
        `Login failed: ${data.message ?? "no access token"}${data.errorCode ? ` ${data.errorCode}` : ""}`
      );
    }

    const expiresIn = Number(data.expiresIn ?? 0);
    return {
      accessToken: data.accessToken,
      refreshToken: data.refreshToken ?? null,
      expiresAt: new Date(this.now() + (Number.isFinite(expiresIn) ? expiresIn : 0) * 1000),
    };
  }

  /**
   * GET an API path, logging in again once when the token is rejected.
   */
  private async get<T>(pathAndQuery: string, signal?: AbortSignal): Promise<T> {
    const url = `${this.server}${APP_URL}${pathAndQuery}`;

    const send = async (forceRefresh: boolean): Promise<Response> => {
      const accessToken = await this.tokens.getAccessToken(forceRefresh);
      return sendRequest(
        url,
        {
          headers: {
            "user-agent": USER_AGENT,
            // Raw token, no "Bearer" prefix
            Authorization: accessToken,
          },
          ...(signal ? { signal } : {}),
        },
        this.ctx
      );
    };

    let response: Response;
    try {
      response = await send(false);
    } catch (error) {
      if (!(error instanceof AuthError)) {
        throw error;
      }
      logger.info("Access token rejected, logging in again...");
      response = await send(true);
    }

    return readJson<T>(response, this.ctx);
  }

  /**
   * Blood pressure readings synced after lastSyncedTime (epoch ms; 0 for the
   * whole history), following the pagination key until the server stops
   * returning one.
   */
  async getBloodPressureReadings(
    options: { lastSyncedTime?: number; phoneIdentifier?: string; signal?: AbortSignal } = {}
  ): Promise<OmronBpReading[]> {
    const { lastSyncedTime = 0, phoneIdentifier = "", signal } = options;
    const readings: OmronBpReading[] = [];
    const seenKeys = new Set<string>();
    let paginationKey = "0";

    for (let page = 0; page < MAX_PAGES; page++) {
      const query = new URLSearchParams({
        nextpaginationKey: paginationKey,
        lastSyncedTime: lastSyncedTime > 0 ? String(lastSyncedTime) : "",
        phoneIdentifier,
      });
      const data = await this.get<BpSyncResponse>(`/v2/sync/bp?${query.toString()}`, signal);

      if (data.success === false) {
        throw new PermanentFetchError(
          `[omron] Blood pressure sync failed: ${data.message ?? "unknown"} ${data.errorCode ?? ""}`.trim()
        );
      }

      readings.push(...(data.data ?? []));
      logger.debug(`Page ${page + 1}: ${data.data?.length ?? 0} readings`);

      const next = String(data.nextpaginationKey ?? "");
      if (next === "" || next === "0" || next === paginationKey || seenKeys.has(next)) {
        return readings;
      }
      seenKeys.add(paginationKey);
      paginationKey = next;
    }

    logger.warn(`Stopped after ${MAX_PAGES} pages`);
    return readings;
  }
}
