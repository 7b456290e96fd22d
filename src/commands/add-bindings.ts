/**
 * `gcp-add-bindings` command.
 *
 * Builds the registry (built-ins plus an optional config file), handles the
 * list/export requests, then reads the CSV and runs the batch. Setup failures
 * stop the run before any row is processed; row failures only affect the
 * exit code.
 */

import type { BindingsLogger } from "../logger.js";
import { formatErrorMessage } from "../retry.js";
import { enablePolicyTracing, disablePolicyTracing, onPolicyCall } from "../diagnostics.js";
import { createCredentialsManager } from "../credentials/index.js";
import { AssetTypeRegistry } from "../registry/index.js";
import { readBindingCsv } from "../csv/index.js";
import { GcpPolicyClient, type PolicyClient } from "../policy/client.js";
import { BindingApplier, type BindingFailure, type BindingResult } from "../bindings/applier.js";
import { processBatch, type AggregateReport } from "../bindings/batch.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type AddBindingsOptions = {
  csvFile?: string;
  /** Service account key file; Application Default Credentials otherwise. */
  credentials?: string;
  dryRun: boolean;
  configFile?: string;
  exportConfig?: string;
  listAssetTypes: boolean;
  verbose: boolean;
  /** Print the report as JSON instead of a table. */
  json: boolean;
  rowDelayMs: number;
};

export type PolicyClientFactory = (options: {
  credentialsPath?: string;
  logger: BindingsLogger;
}) => Promise<PolicyClient>;

export type AddBindingsDeps = {
  logger: BindingsLogger;
  createPolicyClient?: PolicyClientFactory;
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export const createGcpPolicyClient: PolicyClientFactory = async ({ credentialsPath, logger }) => {
  const credentials = createCredentialsManager({ credentialsPath, logger });
  await credentials.initialize();
  // Fail here rather than on every row when no credentials are available.
  await credentials.getAccessToken();
  return new GcpPolicyClient(() => credentials.getAccessToken());
};

/** Simple table formatter for terminal output. */
function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));

  const sep = widths.map((w) => "─".repeat(w + 2)).join("┼");
  const formatRow = (cells: string[]) => cells.map((c, i) => ` ${c.padEnd(widths[i] ?? 0)} `).join("│");

  return [formatRow(headers), sep, ...rows.map(formatRow)].join("\n");
}

function rowLabel(result: BindingResult, index: number): string {
  return result.request.line === undefined ? `#${index + 1}` : `line ${result.request.line}`;
}

function describeResult(result: BindingResult): string {
  const { request } = result;
  const grant = `${request.role} for ${request.userEmail} on ${request.assetName}`;
  switch (result.status) {
    case "applied":
      return result.changed ? `Granted ${grant}` : `Already granted: ${grant}`;
    case "simulated":
      return result.changed ? `Would grant ${grant}` : `Already granted: ${grant}`;
    case "failed":
      return `Failed ${grant}: [${result.error.kind}] ${result.error.message}`;
  }
}

export function formatReport(report: AggregateReport): string {
  const lines: string[] = [];
  const failures = report.results.filter((r): r is BindingFailure => r.status === "failed");

  if (failures.length > 0) {
    lines.push("Failed rows:");
    lines.push(
      table(
        ["Row", "Asset", "Error", "Detail"],
        failures.map((r) => [
          r.request.line === undefined ? "" : String(r.request.line),
          r.request.assetName,
          r.error.kind,
          r.error.message,
        ]),
      ),
    );
    lines.push("");
  }

  lines.push(
    table(
      ["Metric", "Value"],
      [
        ["Mode", report.dryRun ? "dry run" : "apply"],
        ["Total", String(report.total)],
        [report.dryRun ? "Simulated" : "Applied", String(report.dryRun ? report.simulated : report.applied)],
        ["Failed", String(report.failed)],
      ],
    ),
  );
  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

/**
 * Run the command and return the process exit code.
 */
export async function addBindingsCommand(opts: AddBindingsOptions, deps: AddBindingsDeps): Promise<number> {
  const { logger } = deps;
  const createPolicyClient = deps.createPolicyClient ?? createGcpPolicyClient;

  let registry: AssetTypeRegistry;
  let client: PolicyClient;
  let requests: Awaited<ReturnType<typeof readBindingCsv>>;

  try {
    registry = new AssetTypeRegistry({ logger });
    if (opts.configFile) {
      await registry.loadFromConfig(opts.configFile);
    }

    if (opts.listAssetTypes) {
      const types = registry.listAssetTypes();
      logger.info(opts.json ? JSON.stringify(types, null, 2) : types.join("\n"));
    }
    if (opts.exportConfig) {
      await registry.exportToConfig(opts.exportConfig);
    }

    if (!opts.csvFile) {
      if (opts.listAssetTypes || opts.exportConfig) return EXIT_OK;
      logger.error("Missing required option --csv-file <path>");
      return EXIT_FAILURE;
    }

    requests = await readBindingCsv(opts.csvFile);
    logger.debug(`Read ${requests.length} row(s) from ${opts.csvFile}`);
    client = await createPolicyClient({ credentialsPath: opts.credentials, logger });
  } catch (error) {
    logger.error(`Setup failed: ${formatErrorMessage(error)}`);
    return EXIT_FAILURE;
  }

  const unsubscribe = opts.verbose
    ? onPolicyCall((event) => {
        const status = event.statusCode === undefined ? "" : ` HTTP ${event.statusCode}`;
        const outcome = event.ok ? "" : ` failed${status}: ${event.error ?? ""}`;
        logger.debug(`${event.surface} ${event.method} ${event.resource} ${event.durationMs}ms${outcome}`);
      })
    : null;
  if (opts.verbose) enablePolicyTracing();

  let report: AggregateReport;
  try {
    const applier = new BindingApplier({ registry, policyClient: client, logger });
    const total = requests.length;
    report = await processBatch(applier, requests, {
      dryRun: opts.dryRun,
      rowDelayMs: opts.rowDelayMs,
      logger,
      onResult: (result, index) => {
        const line = `[${index + 1}/${total}] ${rowLabel(result, index)}: ${describeResult(result)}`;
        if (result.status === "failed") logger.warn(line);
        else if (opts.json) logger.debug(line);
        else logger.info(line);
      },
    });
  } finally {
    unsubscribe?.();
    if (opts.verbose) disablePolicyTracing();
  }

  if (opts.json) {
    logger.info(JSON.stringify(report, null, 2));
  } else {
    logger.info("");
    logger.info(formatReport(report));
    if (report.hasFailures) {
      logger.error(`${report.failed} of ${report.total} row(s) failed`);
    } else {
      logger.info(opts.dryRun ? "Dry run complete; no policies were changed" : "All bindings applied");
    }
  }

  return report.hasFailures ? EXIT_FAILURE : EXIT_OK;
}
