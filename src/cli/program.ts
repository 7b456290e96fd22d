import { Command, CommanderError, InvalidArgumentError, Option } from "commander";

import { addBindingsCommand, type PolicyClientFactory } from "../commands/add-bindings.js";
import { createConsoleLogger, type ConsoleLoggerOptions } from "../logger.js";
import { VERSION } from "../version.js";

export const DEFAULT_ROW_DELAY_MS = 500;

export type CliDeps = {
  stdout?: ConsoleLoggerOptions["stdout"];
  stderr?: ConsoleLoggerOptions["stderr"];
  color?: boolean;
  createPolicyClient?: PolicyClientFactory;
};

type RawOptions = {
  csvFile?: string;
  credentials?: string;
  dryRun?: boolean;
  configFile?: string;
  exportConfig?: string;
  listAssetTypes?: boolean;
  verbose?: boolean;
  json?: boolean;
  rowDelay: number;
};

function parseDelay(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative whole number of milliseconds.");
  }
  return parsed;
}

/**
 * Build the `gcp-add-bindings` program. The exit code of a completed run is
 * handed to `onExit`.
 */
export function buildProgram(onExit: (code: number) => void, deps: CliDeps = {}): Command {
  const program = new Command();
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;

  program
    .name("gcp-add-bindings")
    .description("Grant IAM role bindings on Google Cloud resources listed in a CSV file")
    .version(VERSION)
    .configureOutput({
      writeOut: (str) => {
        stdout.write(str);
      },
      writeErr: (str) => {
        stderr.write(str);
      },
    })
    .option("--csv-file <path>", "CSV with user_email,project_id,asset_name,asset_type,role columns")
    .option("--credentials <path>", "Service account key file (default: Application Default Credentials)")
    .option("--dry-run", "Show what would be granted without changing any policy")
    .option("--config-file <path>", "Merge asset types from a JSON or YAML config file")
    .option("--export-config <path>", "Write the registered asset types to a JSON or YAML file")
    .option("--list-asset-types", "Print the registered asset types")
    .option("--verbose", "Log debug output and API calls")
    .option("--json", "Print the report as JSON")
    .addOption(
      new Option("--row-delay <ms>", "Pause between rows in milliseconds")
        .argParser(parseDelay)
        .default(DEFAULT_ROW_DELAY_MS),
    )
    .addHelpText(
      "after",
      [
        "",
        "user_email values are granted as user:<email>. A value that already starts",
        "with group:, serviceAccount: or domain: is used as the member unchanged.",
      ].join("\n"),
    )
    .action(async (opts: RawOptions) => {
      const logger = createConsoleLogger({
        verbose: Boolean(opts.verbose),
        color: deps.color,
        stdout,
        stderr,
      });
      const code = await addBindingsCommand(
        {
          csvFile: opts.csvFile,
          credentials: opts.credentials,
          dryRun: Boolean(opts.dryRun),
          configFile: opts.configFile,
          exportConfig: opts.exportConfig,
          listAssetTypes: Boolean(opts.listAssetTypes),
          verbose: Boolean(opts.verbose),
          json: Boolean(opts.json),
          rowDelayMs: opts.rowDelay,
        },
        { logger, createPolicyClient: deps.createPolicyClient },
      );
      onExit(code);
    });

  return program;
}

/**
 * Parse `argv` (user arguments only, without the node and script entries)
 * and run the command.
 *
 * @returns The process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  let exitCode = 0;
  const program = buildProgram((code) => {
    exitCode = code;
  }, deps);
  program.exitOverride();

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    // --help, --version and usage errors; commander has already printed them.
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  return exitCode;
}
