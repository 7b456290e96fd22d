/**
 * Credentials Manager
 *
 * Obtains OAuth2 access tokens from an explicit service account key file or
 * from Application Default Credentials (the ADC file, then the GCE/Cloud Run
 * metadata server, then the gcloud CLI). Uses native Node.js `crypto` for
 * JWT signing; no SDK needed.
 */

import { createSign } from "node:crypto";
import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { execFile as execFileCb } from "node:child_process";
import { promisify } from "node:util";

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import type { GcpRetryOptions } from "../types.js";
import type { BindingsLogger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { withGcpRetry, shouldRetryGcpError, formatErrorMessage } from "../retry.js";

const execFileAsync = promisify(execFileCb);

// =============================================================================
// Types
// =============================================================================

/** Supported authentication methods. */
export type GcpCredentialMethod = "default" | "service-account";

export type GcpCredentialsManagerOptions = {
  credentialMethod?: GcpCredentialMethod;
  serviceAccountKeyFile?: string;
  retry?: GcpRetryOptions;
  logger?: BindingsLogger;
};

const ServiceAccountKeySchema = Type.Object({
  type: Type.Literal("service_account"),
  client_email: Type.String(),
  private_key: Type.String(),
  token_uri: Type.Optional(Type.String()),
});

export type ServiceAccountKey = Static<typeof ServiceAccountKeySchema>;

const AuthorizedUserSchema = Type.Object({
  type: Type.Literal("authorized_user"),
  client_id: Type.String(),
  client_secret: Type.String(),
  refresh_token: Type.String(),
});

type AuthorizedUserCredential = Static<typeof AuthorizedUserSchema>;

const TokenResponseSchema = Type.Object({
  access_token: Type.String(),
  expires_in: Type.Number(),
});

type TokenResponse = Static<typeof TokenResponseSchema>;

// =============================================================================
// Constants
// =============================================================================

const GOOGLE_TOKEN_URL = "https://oauth2.googleapis.com/token";
const CLOUD_PLATFORM_SCOPE = "https://www.googleapis.com/auth/cloud-platform";
const METADATA_TOKEN_URL =
  "http://metadata.google.internal/computeMetadata/v1/instance/service-accounts/default/token";

// =============================================================================
// Credential Cache
// =============================================================================

class CredentialCache {
  private entry: { token: string; expiresAt: number } | null = null;

  get(): string | null {
    if (!this.entry) return null;
    // Refresh 5 minutes before expiry
    if (Date.now() > this.entry.expiresAt - 300_000) {
      this.entry = null;
      return null;
    }
    return this.entry.token;
  }

  set(token: string, expiresInSeconds: number): void {
    this.entry = { token, expiresAt: Date.now() + expiresInSeconds * 1000 };
  }

  clear(): void {
    this.entry = null;
  }
}

// =============================================================================
// JWT Signing (for service account auth)
// =============================================================================

function base64url(input: string | Buffer): string {
  const b64 = Buffer.from(input).toString("base64");
  return b64.replace(/\+/g, "-").replace(/\//g, "_").replace(/=+$/, "");
}

/**
 * Create a signed JWT for service account authentication.
 * Uses RS256 (RSA + SHA-256) as Google OAuth2 expects.
 */
export function createServiceAccountJwt(key: ServiceAccountKey, nowSeconds = Math.floor(Date.now() / 1000)): string {
  const header = base64url(JSON.stringify({ alg: "RS256", typ: "JWT" }));
  const payload = base64url(
    JSON.stringify({
      iss: key.client_email,
      scope: CLOUD_PLATFORM_SCOPE,
      aud: key.token_uri || GOOGLE_TOKEN_URL,
      iat: nowSeconds,
      exp: nowSeconds + 3600,
    }),
  );

  const unsigned = `${header}.${payload}`;
  const signer = createSign("RSA-SHA256");
  signer.update(unsigned);
  const signature = base64url(signer.sign(key.private_key));

  return `${unsigned}.${signature}`;
}

// =============================================================================
// Token acquisition helpers
// =============================================================================

async function readTokenResponse(res: Response, source: string): Promise<TokenResponse> {
  if (!res.ok) {
    const errBody = await res.text();
    throw new Error(`${source} token request failed (HTTP ${res.status}): ${errBody}`);
  }
  const body: unknown = await res.json();
  if (!Value.Check(TokenResponseSchema, body)) {
    throw new Error(`${source} token response is missing access_token/expires_in`);
  }
  return body;
}

/** Exchange a service account JWT for an OAuth2 access token. */
async function getTokenFromServiceAccount(key: ServiceAccountKey): Promise<TokenResponse> {
  const jwt = createServiceAccountJwt(key);

  const res = await fetch(key.token_uri || GOOGLE_TOKEN_URL, {
    method: "POST",
    headers: { "Content-Type": "application/x-www-form-urlencoded" },
    body: `grant_type=${encodeURIComponent("urn:ietf:params:oauth:grant-type:jwt-bearer")}&assertion=${encodeURIComponent(jwt)}`,
  });

  return readTokenResponse(res, "Service account");
}

/** Use a refresh token (authorized_user ADC) to obtain an access token. */
async function getTokenFromRefreshToken(cred: AuthorizedUserCredential): Promise<TokenResponse> {
  const res = await fetch(GOOGLE_TOKEN_URL, {
    method: "POST",
    headers: { "Content-Type": "application/x-www-form-urlencoded" },
    body: [
      `grant_type=refresh_token`,
      `client_id=${encodeURIComponent(cred.client_id)}`,
      `client_secret=${encodeURIComponent(cred.client_secret)}`,
      `refresh_token=${encodeURIComponent(cred.refresh_token)}`,
    ].join("&"),
  });

  return readTokenResponse(res, "Refresh token");
}

/** Fetch an access token from the GCE metadata server. */
async function getTokenFromMetadataServer(): Promise<TokenResponse> {
  const res = await fetch(METADATA_TOKEN_URL, {
    headers: { "Metadata-Flavor": "Google" },
    signal: AbortSignal.timeout(3_000),
  });
  return readTokenResponse(res, "Metadata server");
}

/** Get an access token via `gcloud auth print-access-token`. */
async function getTokenFromGcloudCli(): Promise<TokenResponse> {
  const { stdout } = await execFileAsync("gcloud", ["auth", "print-access-token"]);
  const token = stdout.trim();
  if (!token) throw new Error("gcloud CLI returned empty access token");
  // gcloud tokens are ~1 hour
  return { access_token: token, expires_in: 3600 };
}

/** Read a JSON file and check it against a schema. */
async function readJsonFile<T extends TSchema>(path: string, schema: T, label: string): Promise<Static<T>> {
  const content = await readFile(path, "utf-8");
  const parsed: unknown = JSON.parse(content);
  if (!Value.Check(schema, parsed)) {
    const first = Value.Errors(schema, parsed).First();
    throw new Error(`${path} is not a valid ${label}${first ? `: ${first.path || "/"} ${first.message}` : ""}`);
  }
  return parsed;
}

/** Every Application Default Credentials source failed. Not retried. */
export class CredentialsUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CredentialsUnavailableError";
  }
}

/**
 * Locate the Application Default Credentials file.
 * Checks GOOGLE_APPLICATION_CREDENTIALS env var first, then the well-known path.
 */
export function getAdcFilePath(): string {
  if (process.env.GOOGLE_APPLICATION_CREDENTIALS) {
    return process.env.GOOGLE_APPLICATION_CREDENTIALS;
  }
  return join(homedir(), ".config", "gcloud", "application_default_credentials.json");
}

const AdcFileSchema = Type.Union([ServiceAccountKeySchema, AuthorizedUserSchema]);

// =============================================================================
// GcpCredentialsManager
// =============================================================================

/**
 * Resolves access tokens for the REST policy client.
 */
export class GcpCredentialsManager {
  private method: GcpCredentialMethod;
  private serviceAccountKeyFile?: string;
  private retryOptions: GcpRetryOptions;
  private logger: BindingsLogger;
  private cache = new CredentialCache();
  private serviceAccountKey?: ServiceAccountKey;

  constructor(options: GcpCredentialsManagerOptions = {}) {
    this.method = options.credentialMethod ?? "default";
    this.serviceAccountKeyFile = options.serviceAccountKeyFile;
    this.retryOptions = options.retry ?? {};
    this.logger = options.logger ?? silentLogger;
  }

  getMethod(): GcpCredentialMethod {
    return this.method;
  }

  /**
   * Validate the configured method before any API call is made. For a
   * service account this reads and checks the key file.
   */
  async initialize(): Promise<void> {
    if (this.method !== "service-account") return;
    if (!this.serviceAccountKeyFile) {
      throw new Error("Service account key file is required for service-account auth");
    }
    this.serviceAccountKey = await readJsonFile(
      this.serviceAccountKeyFile,
      ServiceAccountKeySchema,
      "service account key file",
    );
    this.logger.info(`Loaded credentials for ${this.serviceAccountKey.client_email}`);
  }

  /** Obtain a short-lived access token, cached until shortly before expiry. */
  async getAccessToken(): Promise<string> {
    const cached = this.cache.get();
    if (cached) return cached;

    const tokenRes = await withGcpRetry(
      () => (this.method === "service-account" ? this.fromServiceAccount() : this.fromApplicationDefault()),
      this.retryOptions,
      (error) => !(error instanceof CredentialsUnavailableError) && shouldRetryGcpError(error),
    );
    this.cache.set(tokenRes.access_token, tokenRes.expires_in);
    return tokenRes.access_token;
  }

  /** Clear the cached token. */
  clearCache(): void {
    this.cache.clear();
  }

  private async fromServiceAccount(): Promise<TokenResponse> {
    if (!this.serviceAccountKey) await this.initialize();
    const key = this.serviceAccountKey;
    if (!key) throw new Error("Service account key file could not be loaded");
    return getTokenFromServiceAccount(key);
  }

  /** ADC: try the credential file first, then the metadata server, then gcloud. */
  private async fromApplicationDefault(): Promise<TokenResponse> {
    const failures: string[] = [];

    const adcPath = getAdcFilePath();
    try {
      const cred = await readJsonFile(adcPath, AdcFileSchema, "ADC credential file");
      return cred.type === "service_account"
        ? await getTokenFromServiceAccount(cred)
        : await getTokenFromRefreshToken(cred);
    } catch (error) {
      failures.push(`ADC file (${adcPath}): ${formatErrorMessage(error)}`);
    }

    try {
      return await getTokenFromMetadataServer();
    } catch (error) {
      failures.push(`metadata server: ${formatErrorMessage(error)}`);
    }

    try {
      return await getTokenFromGcloudCli();
    } catch (error) {
      failures.push(`gcloud CLI: ${formatErrorMessage(error)}`);
    }

    throw new CredentialsUnavailableError(`Could not obtain Application Default Credentials:\n  ${failures.join("\n  ")}`);
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a credentials manager: an explicit key file selects service-account
 * auth, otherwise Application Default Credentials are used.
 */
export function createCredentialsManager(opts: {
  credentialsPath?: string;
  retry?: GcpRetryOptions;
  logger?: BindingsLogger;
} = {}): GcpCredentialsManager {
  return new GcpCredentialsManager({
    credentialMethod: opts.credentialsPath ? "service-account" : "default",
    serviceAccountKeyFile: opts.credentialsPath,
    retry: opts.retry,
    logger: opts.logger,
  });
}
