/**
 * Retry Utilities
 *
 * Retry logic for Google Cloud REST calls with exponential backoff and jitter.
 */

import type { GcpRetryOptions } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<GcpRetryOptions>;

export const GCP_RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * Error codes that are safe to retry. `ABORTED` is not one of them: IAM
 * answers a stale etag with it.
 */
export const GCP_RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  "ERR_SOCKET_CONNECTION_TIMEOUT",
  "UNAVAILABLE",
  "DEADLINE_EXCEEDED",
  "RESOURCE_EXHAUSTED",
  "INTERNAL",
  "UNKNOWN",
  "SERVICE_UNAVAILABLE",
  "RATE_LIMIT_EXCEEDED",
  "rateLimitExceeded",
  "backendError",
  "internalError",
  "badGateway",
  "serviceUnavailable",
  "gatewayTimeout",
]);

const RETRYABLE_MESSAGE_PATTERNS = [
  "throttl",
  "too many requests",
  "rate limit",
  "quota exceeded",
  "temporarily unavailable",
  "service unavailable",
  "connection reset",
  "socket hang up",
  "econnreset",
  "etimedout",
  "network error",
  "fetch failed",
  "deadline exceeded",
  "backend error",
];

// =============================================================================
// Error Inspection
// =============================================================================

function field(error: unknown, key: string): unknown {
  if (typeof error !== "object" || error === null) return undefined;
  return Reflect.get(error, key);
}

/**
 * Determine whether a Google Cloud error is safe to retry.
 */
export function shouldRetryGcpError(error: unknown): boolean {
  if (error === null || error === undefined) return false;

  // Check error code
  const code = field(error, "code");
  if (typeof code === "string" && GCP_RETRYABLE_CODES.has(code)) return true;

  // Check HTTP status code (429 = throttled, 5xx = server errors)
  const statusCode = field(error, "statusCode") ?? field(error, "status") ?? code;
  if (statusCode === 429) return true;
  if (typeof statusCode === "number" && statusCode >= 500 && statusCode < 600) return true;

  // Check gRPC status codes (14 = UNAVAILABLE, 8 = RESOURCE_EXHAUSTED, 4 = DEADLINE_EXCEEDED)
  if (statusCode === 14 || statusCode === 8 || statusCode === 4) return true;

  // Undici wraps socket errors: `TypeError: fetch failed` with the real code on `cause`
  const cause = field(error, "cause");
  if (cause !== undefined && cause !== error && shouldRetryGcpError(cause)) return true;

  const message = field(error, "message");
  if (typeof message !== "string") return false;
  const lower = message.toLowerCase();
  return RETRYABLE_MESSAGE_PATTERNS.some((pattern) => lower.includes(pattern));
}

/**
 * Extract the Retry-After delay from an error (in ms).
 */
export function getGcpRetryAfterMs(error: unknown): number | null {
  const retryAfter = field(error, "retryAfter");
  if (typeof retryAfter !== "string" || !retryAfter) return null;

  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return null;
}

// =============================================================================
// Retry Execution
// =============================================================================

/**
 * Execute a function with retry logic.
 *
 * @param retryIf - Overrides `shouldRetryGcpError` for calls with their own rules.
 */
export async function withGcpRetry<T>(
  fn: () => Promise<T>,
  options?: GcpRetryOptions,
  retryIf: (error: unknown) => boolean = shouldRetryGcpError,
): Promise<T> {
  const config: RetryConfig = {
    maxAttempts: options?.maxAttempts ?? GCP_RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? GCP_RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? GCP_RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? GCP_RETRY_DEFAULTS.jitterFactor,
  };

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!retryIf(error)) break;

      const retryAfterMs = getGcpRetryAfterMs(error);
      let delayMs: number;

      if (retryAfterMs !== null) {
        delayMs = Math.min(retryAfterMs, config.maxDelayMs);
      } else {
        const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
        const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
        const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
        delayMs = Math.max(config.minDelayMs, cappedDelay + jitter);
      }

      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  throw lastError;
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an error into a human-readable message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  const code = field(error, "code");
  const message = field(error, "message");
  const statusCode = field(error, "statusCode") ?? field(error, "status");

  const parts: string[] = [];
  if (typeof code === "string" && code) parts.push(`[${code}]`);
  if (typeof statusCode === "number" || (typeof statusCode === "string" && statusCode)) {
    parts.push(`(HTTP ${statusCode})`);
  }
  parts.push(typeof message === "string" && message ? message : "Unknown error");

  return parts.join(" ");
}
