/**
 * Credentials vault
 *
 * Stores provider tokens between runs. Fitbit rotates its refresh token on
 * every refresh, so losing the latest one means redoing the OAuth flow.
 *
 * Storage format per service (JSON object):
 * {
 *   "access_token": "...",
 *   "refresh_token": "...",
 *   "_expires_at": "2024-01-01T00:00:00.000Z"
 * }
 *
 * Backends:
 * - FileCredentialsVault: DATA_DIR/credentials.json
 * - PgCredentialsVault: migration.credentials table
 */

import pg from "pg";
import path from "node:path";
import type { ServiceName } from "./errors.js";
import { readJsonFile, SerialQueue, writeJsonDurable } from "./durable-file.js";

const { Client } = pg;

// Types
export interface CredentialsResult {
  credentials: Record<string, unknown>;
  expiresAt: Date | null;
}

export interface CredentialsVault {
  /**
   * @returns stored credentials, or null when the service has none yet
   */
  getCredentials(service: ServiceName): Promise<CredentialsResult | null>;

  /**
   * Merge fields into the stored credentials (creating them if absent).
   *
   * @param expiresAt - New expiry date (null to keep existing)
   */
  updateCredentials(
    service: ServiceName,
    updates: Record<string, unknown>,
    expiresAt?: Date | null
  ): Promise<void>;
}

type StoredSecret = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Split a stored secret into credentials and metadata.
 */
function toResult(data: StoredSecret): CredentialsResult {
  const credentials: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (!key.startsWith("_")) {
      credentials[key] = value;
    }
  }

  const expiresAtStr = data._expires_at;
  const expiresAt =
    typeof expiresAtStr === "string" && !isNaN(Date.parse(expiresAtStr))
      ? new Date(expiresAtStr)
      : null;

  return { credentials, expiresAt };
}

function merge(
  current: StoredSecret | null,
  updates: Record<string, unknown>,
  expiresAt: Date | null
): StoredSecret {
  const merged: StoredSecret = { ...(current ?? {}), ...updates };
  merged._expires_at = expiresAt ? expiresAt.toISOString() : (current?._expires_at ?? null);
  return merged;
}

/**
 * Read a string credential, treating empty strings as missing.
 */
export function credentialString(
  credentials: Record<string, unknown> | undefined,
  key: string
): string | null {
  const value = credentials?.[key];
  return typeof value === "string" && value.length > 0 ? value : null;
}

// =============================================================================
// File backend
// =============================================================================

export class FileCredentialsVault implements CredentialsVault {
  private readonly filePath: string;
  private readonly queue = new SerialQueue();

  constructor(dataDir: string) {
    this.filePath = path.join(dataDir, "credentials.json");
  }

  async getCredentials(service: ServiceName): Promise<CredentialsResult | null> {
    const all = await this.readAll();
    const data = all[service];
    return isRecord(data) ? toResult(data) : null;
  }

  updateCredentials(
    service: ServiceName,
    updates: Record<string, unknown>,
    expiresAt: Date | null = null
  ): Promise<void> {
    return this.queue.run(async () => {
      const all = await this.readAll();
      const current = all[service];
      all[service] = merge(isRecord(current) ? current : null, updates, expiresAt);
      await writeJsonDurable(this.filePath, all);
    });
  }

  private async readAll(): Promise<Record<string, unknown>> {
    const data = await readJsonFile(this.filePath);
    return isRecord(data) ? data : {};
  }
}

// =============================================================================
// PostgreSQL backend
// =============================================================================

export class PgCredentialsVault implements CredentialsVault {
  constructor(private readonly databaseUrl: string) {}

  private getDbConnection(): pg.Client {
    return new Client({ connectionString: this.databaseUrl });
  }

  async getCredentials(service: ServiceName): Promise<CredentialsResult | null> {
    const client = this.getDbConnection();

    try {
      await client.connect();

      const result = await client.query<{ secret: unknown }>(
        "SELECT secret FROM migration.credentials WHERE service = $1",
        [service]
      );

      const row = result.rows[0];
      if (!row) {
        return null;
      }

      const data = typeof row.secret === "string" ? JSON.parse(row.secret) : row.secret;
      return isRecord(data) ? toResult(data) : null;
    } finally {
      await client.end();
    }
  }

  async updateCredentials(
    service: ServiceName,
    updates: Record<string, unknown>,
    expiresAt: Date | null = null
  ): Promise<void> {
    const client = this.getDbConnection();

    try {
      await client.connect();
      await client.query("BEGIN");

      try {
        const existing = await client.query<{ secret: unknown }>(
          "SELECT secret FROM migration.credentials WHERE service = $1 FOR UPDATE",
          [service]
        );
        const currentRow = existing.rows[0];
        const current =
          currentRow && isRecord(currentRow.secret) ? currentRow.secret : null;

        await client.query(
          `INSERT INTO migration.credentials (service, secret, updated_at)
           VALUES ($1, $2, now())
           ON CONFLICT (service) DO UPDATE SET
             secret = EXCLUDED.secret,
             updated_at = EXCLUDED.updated_at`,
          [service, JSON.stringify(merge(current, updates, expiresAt))]
        );

        await client.query("COMMIT");
      } catch (error) {
        await client.query("ROLLBACK");
        throw error;
      }
    } finally {
      await client.end();
    }
  }
}
