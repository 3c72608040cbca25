import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { logger } from "../core/logger.ts";
import { errorMessage } from "../core/errors.ts";
import type { Engine } from "../db/types.ts";
import { IMPORT_NEW_TABLE_ONLY } from "../shell/commands.ts";
import { expandHome } from "../utils/env.ts";
import { typeRows, type RawValue } from "./infer.ts";

/** Columns and untyped cells read from an import file. */
export interface ImportData {
  columns: string[];
  rows: RawValue[][];
}

const CsvRecordsSchema = z.array(z.array(z.string()));
const JsonRecordSchema = z.record(z.string(), z.unknown());

/** Parse CSV text. The first record holds the column names; empty cells are null. */
export function parseCsv(text: string): ImportData {
  const records = CsvRecordsSchema.parse(parse(text, { columns: false, skip_empty_lines: true }));
  const [header = [], ...data] = records;
  return {
    columns: header,
    rows: data.map((record) => record.map((cell) => (cell === "" ? null : cell))),
  };
}

function rawValue(value: unknown): RawValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return JSON.stringify(value);
}

/**
 * Parse JSON Lines text, one object per line. Columns are the keys in
 * order of first appearance; a key missing from a line is null there.
 */
export function parseJsonLines(text: string): ImportData {
  const objects = text
    .split(/\r?\n/)
    .filter((line) => line.trim() !== "")
    .map((line, i) => {
      const parsed = JsonRecordSchema.safeParse(JSON.parse(line));
      if (!parsed.success) throw new Error(`Line ${i + 1} is not a JSON object.`);
      return parsed.data;
    });

  const columns: string[] = [];
  const seen = new Set<string>();
  for (const obj of objects) {
    for (const key of Object.keys(obj)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  return {
    columns,
    rows: objects.map((obj) => columns.map((col) => rawValue(obj[col]))),
  };
}

export interface ImportOptions {
  /** Fail if the table already exists, instead of appending to it. */
  newTableOnly?: boolean;
}

/**
 * Import a `.csv` or `.json` (JSON Lines) file into a table, creating
 * the table if it doesn't exist. Column names are lower-cased.
 * Failures are reported, not thrown.
 */
export async function importTable(
  engine: Engine,
  table: string,
  path: string,
  opts: ImportOptions = {},
): Promise<boolean> {
  const ext = extname(path);
  if (ext !== ".csv" && ext !== ".json") {
    logger.error(`"${ext}" is not a valid file extension for import.`);
    return false;
  }

  try {
    const text = await readFile(expandHome(path), "utf-8");
    const data = ext === ".csv" ? parseCsv(text) : parseJsonLines(text);
    const typed = typeRows(
      data.columns.map((c) => c.toLowerCase()),
      data.rows,
    );

    const lower = table.toLowerCase();
    const existing = (await engine.listTables()).find((t) => t.toLowerCase() === lower);
    if (existing !== undefined && opts.newTableOnly) {
      logger.error(`Table "${table}" already exists, and you specified ${IMPORT_NEW_TABLE_ONLY}.`);
      return false;
    }
    if (existing === undefined) {
      await engine.createTable(table, typed.columns);
    }

    const count = await engine.insertRows(
      existing ?? table,
      typed.columns.map((c) => c.name),
      typed.rows,
    );
    logger.success(`Imported ${count} row${count === 1 ? "" : "s"} into ${existing ?? table}.`);
    return true;
  } catch (err) {
    logger.error(`Import failed: ${errorMessage(err)}`);
    return false;
  }
}
