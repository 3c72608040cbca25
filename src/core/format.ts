import Table from "cli-table3";
import { logger } from "./logger.ts";

/** How a null cell is shown. */
export const NULL_TOKEN = "NULL";

const DEFAULT_EMPTY_MESSAGE = "No data.";

const NUMBER_FORMAT = new Intl.NumberFormat("en-US");

/** Escape a value for CSV output. */
export function csvEscape(value: string): string {
  if (value.includes(",") || value.includes('"') || value.includes("\n")) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Render a single cell value as display text. */
export function formatValue(val: unknown): string {
  if (val === null || val === undefined) return NULL_TOKEN;
  if (val instanceof Date) return val.toISOString();
  if (val instanceof ArrayBuffer) return `<${val.byteLength} bytes>`;
  if (val instanceof Uint8Array) return `<${val.length} bytes>`;
  // JSON columns arrive as parsed objects and arrays
  if (typeof val === "object") {
    return JSON.stringify(val, (_key, item: unknown) => (typeof item === "bigint" ? item.toString() : item));
  }
  return String(val);
}

/**
 * Render rows as a bordered grid:
 *
 * ```
 * +----+-------+
 * | id | name  |
 * +----+-------+
 * | 1  | Alice |
 * +----+-------+
 * ```
 *
 * Each column is as wide as its header or its widest cell.
 */
export function formatTable(
  columns: string[],
  rows: Record<string, unknown>[],
): string {
  const table = new Table({
    head: columns,
    chars: {
      top: "-",
      "top-mid": "+",
      "top-left": "+",
      "top-right": "+",
      bottom: "-",
      "bottom-mid": "+",
      "bottom-left": "+",
      "bottom-right": "+",
      left: "|",
      "left-mid": "+",
      mid: "-",
      "mid-mid": "+",
      right: "|",
      "right-mid": "+",
      middle: "|",
    },
    style: { head: [], border: [], compact: true, "padding-left": 1, "padding-right": 1 },
  });
  for (const row of rows) {
    table.push(columns.map((col) => formatValue(row[col])));
  }
  return table.toString();
}

/**
 * The line printed under a result grid. With a row limit in effect the
 * total is shown as well, and the plural follows the total.
 */
export function formatSummary(
  returned: number,
  total: number,
  limit: number,
  elapsedSeconds?: number,
): string {
  let summary: string;
  if (limit > 0) {
    summary = `${NUMBER_FORMAT.format(returned)} of ${NUMBER_FORMAT.format(total)} row${total === 1 ? "" : "s"}`;
  } else {
    summary = `${NUMBER_FORMAT.format(returned)} row${returned === 1 ? "" : "s"}`;
  }
  if (elapsedSeconds !== undefined) {
    summary = `${summary} (${elapsedSeconds.toFixed(3)} seconds)`;
  }
  return summary;
}

export interface RenderOptions {
  columns: string[];
  rows: Record<string, unknown>[];
  /** Row limit in effect, 0 for unlimited. */
  limit: number;
  /** Rows the statement produced before the limit was applied. */
  total: number;
  elapsedSeconds?: number;
  /** Printed instead of the grid when there are no rows. */
  emptyMessage?: string;
}

/** Print a result grid and its summary, or the empty message if there are no rows. */
export function renderResults(opts: RenderOptions): void {
  if (opts.rows.length === 0) {
    logger.log(opts.emptyMessage ?? DEFAULT_EMPTY_MESSAGE);
    return;
  }

  logger.log(formatTable(opts.columns, opts.rows));
  logger.log(formatSummary(opts.rows.length, opts.total, opts.limit, opts.elapsedSeconds));
  logger.log();
}
