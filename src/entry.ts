#!/usr/bin/env node
/**
 * gcp-add-bindings
 *
 * Usage:
 *   gcp-add-bindings --csv-file bindings.csv --dry-run
 *   gcp-add-bindings --csv-file bindings.csv --credentials key.json
 *   gcp-add-bindings --config-file asset-types.yaml --list-asset-types
 */

import { runCli } from "./cli/program.js";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
    process.exitCode = 1;
  },
);
