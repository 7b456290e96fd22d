/**
 * Policy call tracing
 *
 * Reports every IAM policy read and write the client makes. Disabled unless
 * the CLI runs with `--verbose`.
 */

import type { PolicySurface, PolicyTarget } from "./policy/targets.js";

// =============================================================================
// Types
// =============================================================================

export type PolicyOperation = "read" | "write";

export type PolicyCallEvent = {
  seq: number;
  ok: boolean;
  operation: PolicyOperation;
  surface: PolicySurface;
  /** REST method name, e.g. `getIamPolicy`, `setIamPolicy`, `patch`. */
  method: string;
  resource: string;
  durationMs: number;
  statusCode?: number;
  error?: string;
};

export type PolicyCallListener = (event: PolicyCallEvent) => void;

// =============================================================================
// State
// =============================================================================

let enabled = false;
let seq = 0;
const listeners = new Set<PolicyCallListener>();

export function enablePolicyTracing(): void {
  enabled = true;
}

export function disablePolicyTracing(): void {
  enabled = false;
}

/** Subscribe to policy call events. Returns an unsubscribe function. */
export function onPolicyCall(listener: PolicyCallListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

function emit(event: Omit<PolicyCallEvent, "seq">): void {
  const full: PolicyCallEvent = { ...event, seq: ++seq };
  for (const listener of listeners) {
    try {
      listener(full);
    } catch (error) {
      // Reported, not rethrown: the traced call has already completed.
      process.emitWarning(`Policy trace listener failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

function statusCodeOf(error: unknown): number | undefined {
  return typeof error === "object" && error !== null && "statusCode" in error && typeof error.statusCode === "number"
    ? error.statusCode
    : undefined;
}

// =============================================================================
// Tracing
// =============================================================================

/**
 * Run one policy read or write against `target`, reporting its outcome and
 * duration to subscribers while tracing is enabled.
 */
export async function tracePolicyCall<T>(
  target: PolicyTarget,
  operation: PolicyOperation,
  fn: () => Promise<T>,
): Promise<T> {
  if (!enabled) return fn();

  const method = operation === "read" ? (target.surface === "bigquery-dataset" ? "get" : "getIamPolicy") : target.method;
  const base = { operation, surface: target.surface, method, resource: target.resource };
  const start = Date.now();

  let result: T;
  try {
    result = await fn();
  } catch (error) {
    emit({
      ...base,
      ok: false,
      durationMs: Date.now() - start,
      statusCode: statusCodeOf(error),
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }

  emit({ ...base, ok: true, durationMs: Date.now() - start });
  return result;
}

/** Reset tracing state between tests. */
export function resetPolicyTracingForTest(): void {
  enabled = false;
  seq = 0;
  listeners.clear();
}
