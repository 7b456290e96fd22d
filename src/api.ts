/**
 * REST API Request Helpers
 *
 * Shared utilities for making authenticated requests to Google Cloud REST
 * APIs. Uses native `fetch()` with Bearer token auth; no SDK needed.
 */

// =============================================================================
// Types
// =============================================================================

/** Error raised for a non-2xx response from a Google Cloud REST API. */
export class GcpApiError extends Error {
  /** HTTP status of the response. */
  public readonly statusCode: number;
  /** Google API status (`ABORTED`, `NOT_FOUND`, ...) or the HTTP status as text. */
  public readonly code: string;
  /** Raw `Retry-After` header, when the server sent one. */
  public readonly retryAfter?: string;

  constructor(message: string, statusCode: number, code: string, retryAfter?: string) {
    super(message);
    this.name = "GcpApiError";
    this.statusCode = statusCode;
    this.code = code;
    this.retryAfter = retryAfter;
  }
}

/** Options for a GCP API request. */
export type GcpRequestOptions = {
  method?: string;
  body?: unknown;
  headers?: Record<string, string>;
  timeout?: number;
};

// =============================================================================
// Core Request
// =============================================================================

/**
 * Make an authenticated request to a GCP REST API endpoint.
 *
 * @param url   - Full REST API URL.
 * @param token - OAuth2 access token (Bearer).
 * @returns The parsed JSON response body, left for the caller to validate.
 */
export async function gcpRequest(
  url: string,
  token: string,
  opts?: GcpRequestOptions,
): Promise<unknown> {
  const controller = new AbortController();
  const timeoutMs = opts?.timeout ?? 30_000;
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(url, {
      method: opts?.method ?? "GET",
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": "application/json",
        Accept: "application/json",
        ...opts?.headers,
      },
      body: opts?.body !== undefined ? JSON.stringify(opts.body) : undefined,
      signal: controller.signal,
    });

    if (!res.ok) {
      const errBody: unknown = await res.json().catch(() => ({}));
      const { message, status } = readErrorBody(errBody);
      throw new GcpApiError(
        message ?? `GCP API error: HTTP ${res.status}`,
        res.status,
        status ?? String(res.status),
        res.headers.get("retry-after") ?? undefined,
      );
    }

    // 204 No Content or empty body
    if (res.status === 204) return {};
    if (res.headers.get("content-length") === "0") return {};

    const body: unknown = await res.json();
    return body;
  } finally {
    clearTimeout(timer);
  }
}

/** Pull `error.message` / `error.status` out of a Google API error payload. */
function readErrorBody(body: unknown): { message?: string; status?: string } {
  if (typeof body !== "object" || body === null || !("error" in body)) return {};
  const err = body.error;
  if (typeof err !== "object" || err === null) return {};

  const message = "message" in err && typeof err.message === "string" ? err.message : undefined;
  let status: string | undefined;
  if ("status" in err && typeof err.status === "string" && err.status) {
    status = err.status;
  } else if ("code" in err && (typeof err.code === "string" || typeof err.code === "number")) {
    status = String(err.code);
  }
  return { message, status };
}

// =============================================================================
// Helpers
// =============================================================================

/** Google API root for a service, e.g. `https://storage.googleapis.com/storage/v1`. */
export function apiRoot(serviceName: string, apiVersion: string): string {
  // Storage and BigQuery nest the version under the service name.
  const nested = NESTED_API_ROOTS.has(serviceName) ? `${serviceName}/` : "";
  return `https://${serviceName}.googleapis.com/${nested}${apiVersion}`;
}

const NESTED_API_ROOTS = new Set(["storage", "bigquery"]);

/** Whether a transport error is an optimistic-concurrency rejection. */
export function isConcurrencyRejection(error: unknown): boolean {
  if (!(error instanceof GcpApiError)) return false;
  return error.statusCode === 409 || error.statusCode === 412 || error.code === "ABORTED";
}
