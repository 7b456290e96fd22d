/**
 * CSV input
 *
 * Reads the binding rows file. The whole file is validated before any row
 * is returned, so a malformed file never results in a partial run.
 */

import { readFile } from "node:fs/promises";

import { parse } from "csv-parse/sync";
import { CsvError } from "csv-parse";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import type { BindingRequest } from "../types.js";
import { InvalidInputError } from "../errors.js";

/** Header names, in the order `BindingRequest` fields are built from them. */
export const REQUIRED_COLUMNS = ["user_email", "project_id", "asset_name", "asset_type", "role"] as const;

const ParsedRowsSchema = Type.Array(
  Type.Object({
    record: Type.Array(Type.String()),
    info: Type.Object({ lines: Type.Number() }),
  }),
);

function parseRows(text: string) {
  let rows: unknown;
  try {
    rows = parse(text, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
      info: true,
    });
  } catch (error) {
    if (error instanceof CsvError) {
      throw new InvalidInputError(`Invalid CSV: ${error.message}`, { cause: error });
    }
    throw error;
  }
  if (!Value.Check(ParsedRowsSchema, rows)) {
    throw new InvalidInputError("Invalid CSV: unexpected parser output");
  }
  return rows;
}

/** Parse and validate CSV text into binding requests. */
export function parseBindingCsv(text: string): BindingRequest[] {
  const rows = parseRows(text);
  if (rows.length === 0) {
    throw new InvalidInputError("CSV is empty; expected a header row");
  }

  const [header, ...data] = rows;
  const missing = REQUIRED_COLUMNS.filter((column) => !header.record.includes(column));
  if (missing.length > 0) {
    throw new InvalidInputError(`CSV is missing required column(s): ${missing.join(", ")}`, { line: 1 });
  }
  if (data.length === 0) {
    throw new InvalidInputError("CSV has no data rows");
  }

  const index = Object.fromEntries(REQUIRED_COLUMNS.map((column) => [column, header.record.indexOf(column)]));
  const width = header.record.length;

  return data.map(({ record, info }) => {
    const line = info.lines;
    if (record.length !== width) {
      throw new InvalidInputError(`Line ${line}: expected ${width} field(s), found ${record.length}`, { line });
    }
    const value = (column: (typeof REQUIRED_COLUMNS)[number]) => {
      const field = record[index[column]];
      if (!field) {
        throw new InvalidInputError(`Line ${line}: empty value for ${column}`, { line });
      }
      return field;
    };
    return {
      userEmail: value("user_email"),
      projectId: value("project_id"),
      assetName: value("asset_name"),
      assetType: value("asset_type"),
      role: value("role"),
      line,
    };
  });
}

export async function readBindingCsv(path: string): Promise<BindingRequest[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new InvalidInputError(
      `Could not read CSV file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
  return parseBindingCsv(text);
}
