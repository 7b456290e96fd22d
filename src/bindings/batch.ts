/**
 * Batch Orchestrator
 *
 * Runs the applier over every request in input order and aggregates the
 * outcome. Rows never run concurrently; two rows may target the same policy.
 */

import type { BindingRequest } from "../types.js";
import type { BindingsLogger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { BindingApplier, BindingResult } from "./applier.js";

export type AggregateReport = Readonly<{
  dryRun: boolean;
  total: number;
  applied: number;
  simulated: number;
  failed: number;
  results: readonly BindingResult[];
  hasFailures: boolean;
}>;

export type BatchOptions = {
  dryRun: boolean;
  /** Pause between rows to stay under API quotas (default 0). */
  rowDelayMs?: number;
  logger?: BindingsLogger;
  /** Called after each row, with its 0-based index. */
  onResult?: (result: BindingResult, index: number) => void;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function summarizeResults(results: readonly BindingResult[], dryRun: boolean): AggregateReport {
  const count = (status: BindingResult["status"]) => results.filter((r) => r.status === status).length;
  const failed = count("failed");
  return Object.freeze({
    dryRun,
    total: results.length,
    applied: count("applied"),
    simulated: count("simulated"),
    failed,
    results: Object.freeze([...results]),
    hasFailures: failed > 0,
  });
}

export async function processBatch(
  applier: BindingApplier,
  requests: readonly BindingRequest[],
  options: BatchOptions,
): Promise<AggregateReport> {
  const logger = options.logger ?? silentLogger;
  const delay = options.rowDelayMs ?? 0;
  const results: BindingResult[] = [];

  logger.debug(`Processing ${requests.length} row(s)${options.dryRun ? " (dry run)" : ""}`);

  for (const [index, request] of requests.entries()) {
    if (index > 0 && delay > 0) await sleep(delay);
    const result = await applier.apply(request, { dryRun: options.dryRun });
    results.push(result);
    try {
      options.onResult?.(result, index);
    } catch (error) {
      logger.warn(`Progress callback failed for row ${index + 1}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  return summarizeResults(results, options.dryRun);
}
