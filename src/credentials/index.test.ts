import { createVerify, generateKeyPairSync } from "node:crypto";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from "vitest";

import { execFile } from "node:child_process";

import {
  createCredentialsManager,
  createServiceAccountJwt,
  CredentialsUnavailableError,
  getAdcFilePath,
} from "./index.js";

vi.mock("node:child_process", () => ({
  execFile: vi.fn((_file: string, _args: string[], callback: (error: Error | null) => void) => {
    callback(new Error("gcloud: command not found"));
  }),
}));

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const mockFetch = vi.fn<typeof fetch>();

let privateKey: string;
let publicKey: string;
let dir: string;

beforeAll(() => {
  const pair = generateKeyPairSync("rsa", {
    modulusLength: 2048,
    publicKeyEncoding: { type: "spki", format: "pem" },
    privateKeyEncoding: { type: "pkcs8", format: "pem" },
  });
  privateKey = pair.privateKey;
  publicKey = pair.publicKey;
});

beforeEach(async () => {
  vi.stubGlobal("fetch", mockFetch);
  mockFetch.mockReset();
  dir = await mkdtemp(join(tmpdir(), "credentials-"));
});

afterEach(async () => {
  vi.unstubAllGlobals();
  vi.unstubAllEnvs();
  await rm(dir, { recursive: true, force: true });
});

function serviceAccountKey() {
  return {
    type: "service_account" as const,
    client_email: "deployer@proj1.iam.gserviceaccount.com",
    private_key: privateKey,
    token_uri: "https://oauth2.googleapis.com/token",
  };
}

async function writeJson(name: string, value: unknown): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, JSON.stringify(value));
  return path;
}

function tokenResponse(token: string, expiresIn = 3600): Response {
  return new Response(JSON.stringify({ access_token: token, expires_in: expiresIn }), { status: 200 });
}

function decodeSegment(segment: string): unknown {
  return JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
}

// ===========================================================================
// createServiceAccountJwt
// ===========================================================================

describe("createServiceAccountJwt", () => {
  it("builds an RS256 assertion for the token endpoint", () => {
    const jwt = createServiceAccountJwt(serviceAccountKey(), 1_700_000_000);
    const [header, payload, signature] = jwt.split(".");

    expect(decodeSegment(header)).toEqual({ alg: "RS256", typ: "JWT" });
    expect(decodeSegment(payload)).toEqual({
      iss: "deployer@proj1.iam.gserviceaccount.com",
      scope: "https://www.googleapis.com/auth/cloud-platform",
      aud: "https://oauth2.googleapis.com/token",
      iat: 1_700_000_000,
      exp: 1_700_003_600,
    });

    const verifier = createVerify("RSA-SHA256");
    verifier.update(`${header}.${payload}`);
    expect(verifier.verify(publicKey, Buffer.from(signature, "base64url"))).toBe(true);
  });
});

// ===========================================================================
// Service account
// ===========================================================================

describe("service account credentials", () => {
  it("loads the key file and logs the account", async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const path = await writeJson("key.json", serviceAccountKey());
    const manager = createCredentialsManager({ credentialsPath: path, logger });

    await manager.initialize();

    expect(manager.getMethod()).toBe("service-account");
    expect(logger.info).toHaveBeenCalledWith("Loaded credentials for deployer@proj1.iam.gserviceaccount.com");
  });

  it("rejects a file that is not a service account key", async () => {
    const path = await writeJson("key.json", { type: "service_account", client_email: "x@example.com" });
    const manager = createCredentialsManager({ credentialsPath: path });

    await expect(manager.initialize()).rejects.toThrow(`${path} is not a valid service account key file`);
  });

  it("exchanges a signed assertion for a token and caches it", async () => {
    const path = await writeJson("key.json", serviceAccountKey());
    const manager = createCredentialsManager({ credentialsPath: path });
    mockFetch.mockResolvedValueOnce(tokenResponse("test-token"));

    await expect(manager.getAccessToken()).resolves.toBe("test-token");
    await expect(manager.getAccessToken()).resolves.toBe("test-token");

    expect(mockFetch).toHaveBeenCalledOnce();
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("https://oauth2.googleapis.com/token");
    expect(init?.method).toBe("POST");
    expect(String(init?.body)).toMatch(
      /^grant_type=urn%3Aietf%3Aparams%3Aoauth%3Agrant-type%3Ajwt-bearer&assertion=[\w-]+\.[\w-]+\.[\w-]+$/,
    );
  });

  it("refreshes a token that is about to expire", async () => {
    const path = await writeJson("key.json", serviceAccountKey());
    const manager = createCredentialsManager({ credentialsPath: path });
    mockFetch.mockResolvedValueOnce(tokenResponse("test-token-1", 60));
    mockFetch.mockResolvedValueOnce(tokenResponse("test-token-2", 3600));

    await expect(manager.getAccessToken()).resolves.toBe("test-token-1");
    await expect(manager.getAccessToken()).resolves.toBe("test-token-2");
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("reports a rejected token request", async () => {
    const path = await writeJson("key.json", serviceAccountKey());
    const manager = createCredentialsManager({ credentialsPath: path });
    mockFetch.mockResolvedValueOnce(new Response("invalid_grant", { status: 400 }));

    await expect(manager.getAccessToken()).rejects.toThrow(
      "Service account token request failed (HTTP 400): invalid_grant",
    );
  });
});

// ===========================================================================
// Application Default Credentials
// ===========================================================================

describe("application default credentials", () => {
  it("prefers GOOGLE_APPLICATION_CREDENTIALS", () => {
    vi.stubEnv("GOOGLE_APPLICATION_CREDENTIALS", "/tmp/adc.json");
    expect(getAdcFilePath()).toBe("/tmp/adc.json");
  });

  it("uses the refresh token of an authorized user", async () => {
    const path = await writeJson("adc.json", {
      type: "authorized_user",
      client_id: "test-client",
      client_secret: "test-secret",
      refresh_token: "test-refresh",
    });
    vi.stubEnv("GOOGLE_APPLICATION_CREDENTIALS", path);
    mockFetch.mockResolvedValueOnce(tokenResponse("test-token"));

    const manager = createCredentialsManager();
    await expect(manager.getAccessToken()).resolves.toBe("test-token");

    expect(manager.getMethod()).toBe("default");
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("https://oauth2.googleapis.com/token");
    expect(init?.body).toBe(
      "grant_type=refresh_token&client_id=test-client&client_secret=test-secret&refresh_token=test-refresh",
    );
  });

  it("falls back to the metadata server", async () => {
    vi.stubEnv("GOOGLE_APPLICATION_CREDENTIALS", join(dir, "missing.json"));
    mockFetch.mockResolvedValueOnce(tokenResponse("test-metadata-token"));

    await expect(createCredentialsManager().getAccessToken()).resolves.toBe("test-metadata-token");

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("http://metadata.google.internal/computeMetadata/v1/instance/service-accounts/default/token");
    expect(init?.headers).toEqual({ "Metadata-Flavor": "Google" });
  });

  it("lists every source it tried when all fail", async () => {
    const missing = join(dir, "missing.json");
    vi.stubEnv("GOOGLE_APPLICATION_CREDENTIALS", missing);
    mockFetch.mockRejectedValueOnce(new Error("metadata host unreachable"));

    const error = await createCredentialsManager()
      .getAccessToken()
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CredentialsUnavailableError);
    const lines = error instanceof Error ? error.message.split("\n") : [];
    expect(lines[0]).toBe("Could not obtain Application Default Credentials:");
    expect(lines[1]).toMatch(new RegExp(`^  ADC file \\(${missing.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}\\): `));
    expect(lines[2]).toBe("  metadata server: metadata host unreachable");
    expect(lines[3]).toBe("  gcloud CLI: gcloud: command not found");
  });

  it("walks the chain once when no source is available", async () => {
    vi.stubEnv("GOOGLE_APPLICATION_CREDENTIALS", join(dir, "missing.json"));
    mockFetch.mockRejectedValue(new TypeError("fetch failed"));
    vi.mocked(execFile).mockClear();

    await expect(createCredentialsManager().getAccessToken()).rejects.toBeInstanceOf(CredentialsUnavailableError);

    expect(mockFetch).toHaveBeenCalledOnce();
    expect(execFile).toHaveBeenCalledOnce();
  });
});
