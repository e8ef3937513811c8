/**
 * Credential Store - OAuth client and token material on disk
 *
 * One file per value inside the credential directory. A value missing on
 * disk is taken from the environment and written out, so the directory is
 * the single source of truth after the first start.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { ConfigurationError } from "../errors.js";
import { sourceLogger } from "../logger.js";

import type { Credentials, TokenRotation } from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface CredentialStore {
  load(): Promise<Credentials>;
  /** Persist tokens handed out by a refresh; must finish before they are used */
  saveRotation(rotation: TokenRotation, now?: Date): Promise<void>;
  save(credentials: Credentials): Promise<void>;
}

const CREDENTIAL_FILES = [
  "client_id",
  "client_secret",
  "access_token",
  "refresh_token",
  "expires_at",
] as const;

type CredentialFile = (typeof CREDENTIAL_FILES)[number];

const ENV_FALLBACK: Record<CredentialFile, string> = {
  client_id: "CLIENT_ID",
  client_secret: "CLIENT_SECRET",
  access_token: "ACCESS_TOKEN",
  refresh_token: "REFRESH_TOKEN",
  expires_at: "EXPIRES_AT",
};

const REQUIRED_FILES: readonly CredentialFile[] = [
  "client_id",
  "client_secret",
  "access_token",
  "refresh_token",
];

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function parseExpiresAt(value: string | null): number | null {
  if (value === null) {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? Math.floor(parsed) : null;
}

// ============================================================================
// File store
// ============================================================================

export class FileCredentialStore implements CredentialStore {
  constructor(
    private readonly dir: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  async load(): Promise<Credentials> {
    const values = new Map<CredentialFile, string | null>();
    for (const file of CREDENTIAL_FILES) {
      values.set(file, await this.resolve(file));
    }

    const missing = REQUIRED_FILES.filter((file) => values.get(file) == null);
    if (missing.length > 0) {
      throw new ConfigurationError(
        `Missing credentials in ${this.dir}: ${missing.join(", ")}`,
        missing.map(
          (file) =>
            `${file}: not found on disk and ${ENV_FALLBACK[file]} is not set`
        )
      );
    }

    return {
      clientId: values.get("client_id") ?? "",
      clientSecret: values.get("client_secret") ?? "",
      accessToken: values.get("access_token") ?? "",
      refreshToken: values.get("refresh_token") ?? "",
      expiresAt: parseExpiresAt(values.get("expires_at") ?? null),
    };
  }

  async saveRotation(
    rotation: TokenRotation,
    now: Date = new Date()
  ): Promise<void> {
    const expiresAt =
      Math.floor(now.getTime() / 1000) + Math.floor(rotation.expiresIn);

    await this.writeValue("access_token", rotation.accessToken);
    await this.writeValue("refresh_token", rotation.refreshToken);
    await this.writeValue("expires_at", String(expiresAt));

    sourceLogger.info(
      { dir: this.dir, expiresAt: new Date(expiresAt * 1000).toISOString() },
      "Saved rotated tokens"
    );
  }

  async save(credentials: Credentials): Promise<void> {
    await this.writeValue("client_id", credentials.clientId);
    await this.writeValue("client_secret", credentials.clientSecret);
    await this.writeValue("access_token", credentials.accessToken);
    await this.writeValue("refresh_token", credentials.refreshToken);
    if (credentials.expiresAt !== null) {
      await this.writeValue("expires_at", String(credentials.expiresAt));
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async resolve(file: CredentialFile): Promise<string | null> {
    const stored = await this.readValue(file);
    if (stored !== null) {
      return stored;
    }

    const fromEnv = this.env[ENV_FALLBACK[file]]?.trim();
    if (fromEnv === undefined || fromEnv === "") {
      return null;
    }

    await this.writeValue(file, fromEnv);
    sourceLogger.info(
      { file, variable: ENV_FALLBACK[file] },
      "Seeded credential file from environment"
    );
    return fromEnv;
  }

  private async readValue(file: CredentialFile): Promise<string | null> {
    try {
      const content = (await readFile(join(this.dir, file), "utf8")).trim();
      return content === "" ? null : content;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  private async writeValue(file: CredentialFile, value: string): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeFile(join(this.dir, file), value, {
      encoding: "utf8",
      mode: 0o600,
    });
  }
}
