/**
 * Garmin Connect API Client
 *
 * OAuth 2.0 bearer token (refresh token grant) and the calls the sink needs:
 * listing and adding blood pressure readings, listing weigh-ins and uploading
 * FIT files.
 *
 * Credentials:
 * - Loaded from the credentials vault, seeded by GARMIN_ACCESS_TOKEN /
 *   GARMIN_REFRESH_TOKEN
 * - Refreshed with GARMIN_CLIENT_ID / GARMIN_CLIENT_SECRET
 */

import { AuthError, PermanentUploadError } from "../../lib/errors.js";
import type { CredentialsVault } from "../../lib/credentials-vault.js";
import type { GarminConfig } from "../../lib/config.js";
import { readJson, sendRequest, type FetchLike, type RequestContext } from "../../lib/http.js";
import { setupLogger } from "../../lib/logger.js";
import type { RateLimiter } from "../../lib/rate-limiter.js";
import { TokenManager, type TokenSet } from "../../lib/token-manager.js";

const logger = setupLogger("garmin-api");

// Configuration
export const GARMIN_TOKEN_URL = "https://diauth.garmin.com/di-oauth2-service/oauth/token";
export const GARMIN_API_BASE = "https://connectapi.garmin.com";
const USER_AGENT = "GCM-iOS-5.7.2.1";
const MIN_EXPIRES_IN_SEC = 60;

// Types
interface TokenResponse {
  access_token: string;
  refresh_token?: string;
  expires_in?: number | string;
}

export interface GarminBpMeasurement {
  systolic: number;
  diastolic: number;
  pulse: number;
  /** "YYYY-MM-DDTHH:mm:ss.S", UTC without zone suffix */
  measurementTimestampGMT: string;
  measurementTimestampLocal?: string;
}

interface BpRangeResponse {
  measurementSummaries?: Array<{ measurements?: GarminBpMeasurement[] }>;
}

export interface GarminBpPayload {
  measurementTimestampLocal: string;
  measurementTimestampGMT: string;
  systolic: number;
  diastolic: number;
  pulse: number;
  sourceType: "MANUAL";
  notes: string;
}

export interface GarminWeighIn {
  /** Epoch milliseconds */
  timestampGMT?: number;
  date?: number;
  weight?: number;
}

interface WeightRangeResponse {
  dateWeightList?: GarminWeighIn[];
}

export interface GarminClientOptions {
  config: GarminConfig;
  vault: CredentialsVault;
  limiter: RateLimiter;
  fetchImpl?: FetchLike;
  now?: () => number;
}

export class GarminClient {
  private readonly config: GarminConfig;
  private readonly tokens: TokenManager;
  private readonly ctx: RequestContext;
  private readonly now: () => number;

  constructor(options: GarminClientOptions) {
    this.config = options.config;
    this.now = options.now ?? Date.now;
    this.ctx = {
      service: "garmin",
      limiter: options.limiter,
      kind: "upload",
      fetchImpl: options.fetchImpl,
    };
    this.tokens = new TokenManager({
      service: "garmin",
      vault: options.vault,
      seed: {
        accessToken: options.config.accessToken,
        refreshToken: options.config.refreshToken,
      },
      refresh: (current) => this.refreshToken(current),
      thresholdMinutes: 5,
      now: this.now,
    });
  }

  async ensureToken(): Promise<void> {
    await this.tokens.getAccessToken();
  }

  private async refreshToken(current: TokenSet | null): Promise<TokenSet> {
    const refreshToken = current?.refreshToken;
    if (!refreshToken) {
      throw new AuthError(
        "garmin",
        "No usable token. Set GARMIN_ACCESS_TOKEN / GARMIN_REFRESH_TOKEN."
      );
    }
    if (!this.config.clientId || !this.config.clientSecret) {
      throw new AuthError(
        "garmin",
        "Token expired and GARMIN_CLIENT_ID / GARMIN_CLIENT_SECRET are not set"
      );
    }

    let response: Response;
    try {
      response = await sendRequest(
        GARMIN_TOKEN_URL,
        {
          method: "POST",
          headers: { "Content-Type": "application/x-www-form-urlencoded" },
          body: new URLSearchParams({
            grant_type: "refresh_token",
            client_id: this.config.clientId,
            client_secret: this.config.clientSecret,
            refresh_token: refreshToken,
          }),
        },
        this.ctx
      );
    } catch (error) {
      if (error instanceof PermanentUploadError) {
        throw new AuthError("garmin", `Token refresh rejected: ${error.message}`, { cause: error });
      }
      throw error;
    }

    const token = await readJson<TokenResponse>(response, this.ctx);
    const expiresIn = Math.max(MIN_EXPIRES_IN_SEC, Number(token.expires_in ?? 0) || 0);
    return {
      accessToken: token.access_token,
      refreshToken: token.refresh_token ?? refreshToken,
      expiresAt: new Date(this.now() + expiresIn * 1000),
    };
  }

  /**
   * Send an API request, refreshing the token once when it is rejected.
   */
  private async request(pathAndQuery: string, init: RequestInit = {}): Promise<Response> {
    const url = `${GARMIN_API_BASE}${pathAndQuery}`;

    const send = async (forceRefresh: boolean): Promise<Response> => {
      const accessToken = await this.tokens.getAccessToken(forceRefresh);
      const headers = new Headers(init.headers);
      headers.set("Authorization", `Bearer ${accessToken}`);
      headers.set("User-Agent", USER_AGENT);
      return sendRequest(url, { ...init, headers }, this.ctx);
    };

    try {
      return await send(false);
    } catch (error) {
      if (!(error instanceof AuthError)) {
        throw error;
      }
      logger.info("Access token rejected, refreshing...");
      return send(true);
    }
  }

  /**
   * Blood pressure readings between two local dates (inclusive).
   */
  async listBloodPressure(startDate: string, endDate: string): Promise<GarminBpMeasurement[]> {
    const response = await this.request(
      `/bloodpressure-service/bloodpressure/range/${startDate}/${endDate}?includeAll=true`
    );
    const data = await readJson<BpRangeResponse>(response, this.ctx);
    return (data.measurementSummaries ?? []).flatMap((summary) => summary.measurements ?? []);
  }

  async addBloodPressure(payload: GarminBpPayload): Promise<void> {
    await this.request("/bloodpressure-service/bloodpressure", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
    });
  }

  /**
   * Weigh-ins between two local dates (inclusive).
   */
  async listWeighIns(startDate: string, endDate: string): Promise<GarminWeighIn[]> {
    const query = new URLSearchParams({ startDate, endDate });
    const response = await this.request(`/weight-service/weight/dateRange?${query.toString()}`);
    const data = await readJson<WeightRangeResponse>(response, this.ctx);
    return data.dateWeightList ?? [];
  }

  /**
   * Upload a FIT file.
   *
   * @throws DuplicateRejected when Garmin answers 409
   */
  async uploadFit(file: Uint8Array, filename: string): Promise<void> {
    const form = new FormData();
    form.append("file", new Blob([file], { type: "application/octet-stream" }), filename);

    await this.request("/upload-service/upload", { method: "POST", body: form });
  }
}
