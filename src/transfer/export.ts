import { writeFileSync } from "node:fs";
import { extname } from "node:path";
import { csvEscape } from "../core/format.ts";
import { logger } from "../core/logger.ts";
import { errorMessage } from "../core/errors.ts";
import type { Engine, Row } from "../db/types.ts";
import { expandHome } from "../utils/env.ts";

export type ExportFormat = "csv" | "json";

const FORMATS: Record<string, ExportFormat> = { ".csv": "csv", ".json": "json" };

/**
 * A date at midnight UTC is written as `YYYY-MM-DD`, anything else as a
 * full ISO-8601 date-time. Drivers return DATE columns as midnight UTC.
 */
export function formatDate(date: Date): string {
  const iso = date.toISOString();
  return iso.endsWith("T00:00:00.000Z") ? iso.slice(0, 10) : iso;
}

/** A value as it appears in a JSON Lines export. */
export function jsonValue(value: unknown): unknown {
  if (value === undefined) return null;
  if (value instanceof Date) return formatDate(value);
  if (typeof value === "bigint") {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (value instanceof ArrayBuffer) return Buffer.from(value).toString("base64");
  if (value instanceof Uint8Array) return Buffer.from(value).toString("base64");
  return value;
}

/** A value as it appears in a CSV export. Nulls are empty. */
export function csvValue(value: unknown): string {
  const converted = jsonValue(value);
  if (converted === null) return "";
  if (typeof converted === "object") return csvEscape(JSON.stringify(converted));
  return csvEscape(String(converted));
}

export function toCsv(columns: string[], rows: Row[]): string {
  const lines = [columns.map(csvEscape).join(",")];
  for (const row of rows) {
    lines.push(columns.map((col) => csvValue(row[col])).join(","));
  }
  return lines.join("\n") + "\n";
}

export function toJsonLines(columns: string[], rows: Row[]): string {
  return rows
    .map((row) => {
      const out: Record<string, unknown> = {};
      for (const col of columns) out[col] = jsonValue(row[col]);
      return JSON.stringify(out) + "\n";
    })
    .join("");
}

/**
 * Export a table to `path`. The extension picks the format: `.csv`, or
 * `.json` for JSON Lines. Failures are reported, not thrown.
 */
export async function exportTable(engine: Engine, table: string, path: string): Promise<boolean> {
  const format = FORMATS[extname(path)];
  if (format === undefined) {
    logger.error('Export file must end in ".csv" or ".json".');
    return false;
  }

  const target = expandHome(path);
  try {
    logger.log(
      format === "csv"
        ? `Exporting ${table} as CSV to ${target} ...`
        : `Exporting ${table} as JSON (lines) to ${target} ...`,
    );
    const result = await engine.execute(`select * from ${table}`);
    const columns = result.kind === "rows" ? result.columns : [];
    const rows = result.kind === "rows" ? result.rows : [];

    writeFileSync(target, format === "csv" ? toCsv(columns, rows) : toJsonLines(columns, rows), "utf-8");
    return true;
  } catch (err) {
    logger.error(`Export failed: ${errorMessage(err)}`);
    return false;
  }
}
