/**
 * Access token cache
 *
 * Shared by the provider clients:
 * - tokens are loaded from the credentials vault, falling back to a seed
 *   from the environment
 * - a token close to expiry is refreshed through the client's callback
 * - refreshed tokens are written back to the vault (refresh tokens rotate)
 * - concurrent callers share one in-flight refresh
 */

import { AuthError, type ServiceName } from "./errors.js";
import { credentialString, type CredentialsVault } from "./credentials-vault.js";
import { setupLogger, type Logger } from "./logger.js";

const DEFAULT_THRESHOLD_MINUTES = 60;

export interface TokenSet {
  accessToken: string | null;
  refreshToken: string | null;
  /** null: unknown, used until the provider rejects it */
  expiresAt: Date | null;
}

export interface TokenManagerOptions {
  service: ServiceName;
  vault: CredentialsVault;
  /** Used when the vault holds nothing for this service */
  seed?: Partial<TokenSet>;
  /**
   * Obtain a fresh token set. Receives the current set (null when nothing
   * is known yet).
   */
  refresh: (current: TokenSet | null) => Promise<TokenSet>;
  /** Refresh this many minutes before expiry */
  thresholdMinutes?: number;
  now?: () => number;
}

export class TokenManager {
  private readonly service: ServiceName;
  private readonly vault: CredentialsVault;
  private readonly seed: TokenSet | null;
  private readonly refresh: (current: TokenSet | null) => Promise<TokenSet>;
  private readonly thresholdMinutes: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private cached: TokenSet | null = null;
  private loaded = false;
  private refreshInProgress: Promise<string> | null = null; // Prevent concurrent refresh

  constructor(options: TokenManagerOptions) {
    this.service = options.service;
    this.vault = options.vault;
    this.refresh = options.refresh;
    this.thresholdMinutes = options.thresholdMinutes ?? DEFAULT_THRESHOLD_MINUTES;
    this.now = options.now ?? Date.now;
    this.logger = setupLogger(`${options.service}-auth`);

    const seed = options.seed;
    this.seed =
      seed && (seed.accessToken || seed.refreshToken)
        ? {
            accessToken: seed.accessToken ?? null,
            refreshToken: seed.refreshToken ?? null,
            expiresAt: seed.expiresAt ?? null,
          }
        : null;
  }

  /**
   * Get a usable access token (cached with auto-refresh).
   *
   * @param forceRefresh - refresh even when the cached token looks valid
   *   (the provider answered 401 to it)
   * @throws AuthError when no token can be obtained
   */
  async getAccessToken(forceRefresh: boolean = false): Promise<string> {
    // Fast path, no lock needed
    if (!forceRefresh && this.cached?.accessToken && this.isFresh(this.cached)) {
      return this.cached.accessToken;
    }

    // If refresh is already in progress, wait for it
    if (this.refreshInProgress !== null) {
      this.logger.debug("Waiting for existing refresh to complete...");
      return this.refreshInProgress;
    }

    this.refreshInProgress = this.loadOrRefresh(forceRefresh);

    try {
      return await this.refreshInProgress;
    } finally {
      this.refreshInProgress = null;
    }
  }

  /**
   * Current refresh token, if one is known.
   */
  getRefreshToken(): string | null {
    return this.cached?.refreshToken ?? null;
  }

  private isFresh(tokens: TokenSet): boolean {
    if (tokens.expiresAt === null) {
      return true;
    }
    const minutesUntilExpiry = (tokens.expiresAt.getTime() - this.now()) / 1000 / 60;
    return minutesUntilExpiry > this.thresholdMinutes;
  }

  private async loadOrRefresh(forceRefresh: boolean): Promise<string> {
    if (!this.loaded) {
      this.cached = (await this.loadFromVault()) ?? this.seed;
      this.loaded = true;
    }

    const current = this.cached;
    if (!forceRefresh && current?.accessToken && this.isFresh(current)) {
      this.logger.debug("Using stored access token");
      return current.accessToken;
    }

    this.logger.info("Refreshing access token...");
    const next = await this.refresh(current);

    if (!next.accessToken) {
      throw new AuthError(this.service, "Token refresh returned no access token");
    }

    const refreshToken = next.refreshToken ?? current?.refreshToken ?? null;
    this.cached = { ...next, refreshToken };

    await this.vault.updateCredentials(
      this.service,
      { access_token: next.accessToken, refresh_token: refreshToken },
      next.expiresAt
    );

    this.logger.info(
      `Token refreshed (expires: ${next.expiresAt ? next.expiresAt.toISOString() : "unknown"})`
    );
    return next.accessToken;
  }

  private async loadFromVault(): Promise<TokenSet | null> {
    this.logger.debug("Loading credentials from vault...");
    const stored = await this.vault.getCredentials(this.service);
    if (!stored) {
      return null;
    }

    const accessToken = credentialString(stored.credentials, "access_token");
    const refreshToken = credentialString(stored.credentials, "refresh_token");
    if (!accessToken && !refreshToken) {
      return null;
    }
    return { accessToken, refreshToken, expiresAt: stored.expiresAt };
  }
}
