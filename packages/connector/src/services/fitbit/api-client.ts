/**
 * Fitbit API Client
 *
 * OAuth 2.0 authentication (refresh token) and API calls.
 * Data fetching only, no migration state.
 *
 * Credentials:
 * - Loaded from the credentials vault, seeded by FITBIT_REFRESH_TOKEN
 * - access_token is auto-refreshed when expired (or rejected with 401)
 * - refresh_token rotates on each refresh and is written back
 */

import { AuthError, PermanentFetchError } from "../../lib/errors.js";
import type { CredentialsVault } from "../../lib/credentials-vault.js";
import type { FitbitConfig } from "../../lib/config.js";
import { readJson, sendRequest, type FetchLike, type RequestContext } from "../../lib/http.js";
import { setupLogger } from "../../lib/logger.js";
import type { RateLimiter } from "../../lib/rate-limiter.js";
import { TokenManager, type TokenSet } from "../../lib/token-manager.js";

const logger = setupLogger("fitbit-api");

// Configuration
export const FITBIT_TOKEN_URL = "https://api.fitbit.com/oauth2/token";
export const FITBIT_API_BASE = "https://api.fitbit.com";
const DEFAULT_EXPIRES_IN_SEC = 8 * 60 * 60; // Fitbit tokens expire in 8 hours

// Types
interface TokenResponse {
  access_token: string;
  expires_in?: number;
  token_type?: string;
  refresh_token: string;
  scope?: string;
  user_id?: string;
}

export interface FitbitProfile {
  user: {
    offsetFromUTCMillis?: number;
    timezone?: string;
  };
}

/** One entry of /body/log/weight */
export interface FitbitWeightLog {
  logId: number;
  date: string; // YYYY-MM-DD, user's local time
  time?: string; // HH:mm:ss, user's local time
  weight?: number;
  bmi?: number;
  fat?: number;
  body_fat?: number;
  source?: string;
}

interface WeightLogResponse {
  weight?: FitbitWeightLog[];
}

export interface FitbitClientOptions {
  config: FitbitConfig;
  vault: CredentialsVault;
  limiter: RateLimiter;
  fetchImpl?: FetchLike;
  now?: () => number;
}

export class FitbitClient {
  private readonly config: FitbitConfig;
  private readonly tokens: TokenManager;
  private readonly ctx: RequestContext;
  private readonly now: () => number;

  constructor(options: FitbitClientOptions) {
    this.config = options.config;
    this.now = options.now ?? Date.now;
    this.ctx = {
      service: "fitbit",
      limiter: options.limiter,
      kind: "fetch",
      fetchImpl: options.fetchImpl,
    };
    this.tokens = new TokenManager({
      service: "fitbit",
      vault: options.vault,
      seed: { refreshToken: options.config.refreshToken },
      refresh: (current) => this.refreshToken(current),
      now: this.now,
    });
  }

  /**
   * Make sure a valid access token is available.
   */
  async ensureToken(): Promise<void> {
    await this.tokens.getAccessToken();
  }

  /**
   * Refresh access token from Fitbit OAuth
   */
  private async refreshToken(current: TokenSet | null): Promise<TokenSet> {
    const refreshToken = current?.refreshToken;
    if (!refreshToken) {
      throw new AuthError("fitbit", "Missing refresh_token. Run OAuth flow first.");
    }

    const basic = Buffer.from(`${this.config.clientId}:${this.config.clientSecret}`).toString(
      "base64"
    );

    let response: Response;
    try {
      response = await sendRequest(
        FITBIT_TOKEN_URL,
        {
          method: "POST",
          headers: {
            "Content-Type": "application/x-www-form-urlencoded",
            Authorization: `Basic ${basic}`,
          },
          body: new URLSearchParams({
            grant_type: "refresh_token",
            refresh_token: refreshToken,
          }),
        },
        this.ctx
      );
    } catch (error) {
      // 400 invalid_grant: the refresh token was revoked or already used
      if (error instanceof PermanentFetchError) {
        throw new AuthError("fitbit", `Token refresh rejected: ${error.message}`, { cause: error });
      }
      throw error;
    }

    const token = await readJson<TokenResponse>(response, this.ctx);
    return {
      accessToken: token.access_token,
      refreshToken: token.refresh_token,
      expiresAt: new Date(this.now() + (token.expires_in ?? DEFAULT_EXPIRES_IN_SEC) * 1000),
    };
  }

  /**
   * GET an API path, refreshing the token once when it is rejected.
   */
  private async get<T>(pathname: string, signal?: AbortSignal): Promise<T> {
    const url = `${FITBIT_API_BASE}${pathname}`;

    const send = async (forceRefresh: boolean): Promise<Response> => {
      const accessToken = await this.tokens.getAccessToken(forceRefresh);
      return sendRequest(
        url,
        {
          headers: {
            Authorization: `Bearer ${accessToken}`,
            "Accept-Language": this.config.unitSystem,
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
      logger.info("Access token rejected, refreshing...");
      response = await send(true);
    }

    return readJson<T>(response, this.ctx);
  }

  async getProfile(): Promise<FitbitProfile> {
    return this.get<FitbitProfile>("/1/user/-/profile.json");
  }

  /**
   * Weight logs for a date range (inclusive, at most 31 days).
   */
  async getWeightLogs(startDate: string, endDate: string, signal?: AbortSignal): Promise<FitbitWeightLog[]> {
    logger.debug(`Fetching weight logs ${startDate}..${endDate}`);
    const data = await this.get<WeightLogResponse>(
      `/1/user/-/body/log/weight/date/${startDate}/${endDate}.json`,
      signal
    );
    return data.weight ?? [];
  }
}
