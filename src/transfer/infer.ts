import type { ColumnDefinition, ColumnType, ImportValue } from "../db/types.ts";

/** A cell as read from an import file, before typing. */
export type RawValue = string | number | boolean | null;

const INTEGER = /^[-+]?\d+$/;
const REAL = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const BOOLEAN = /^(true|false)$/i;

/** The narrowest type that holds a single value, or `null` for a null. */
export function valueType(value: RawValue): ColumnType | null {
  if (value === null) return null;
  if (typeof value === "boolean") return "boolean";
  if (typeof value === "number") return Number.isSafeInteger(value) ? "integer" : "real";

  if (INTEGER.test(value)) return Number.isSafeInteger(Number(value)) ? "integer" : "text";
  if (REAL.test(value)) return "real";
  if (BOOLEAN.test(value)) return "boolean";
  return "text";
}

/**
 * Infer a column's type from its values. Integers and reals mix to
 * real; any other mix is text, and so is a column of nulls.
 */
export function inferColumnType(values: Iterable<RawValue>): ColumnType {
  let inferred: ColumnType | null = null;
  for (const value of values) {
    const type = valueType(value);
    if (type === null || type === inferred) continue;
    if (inferred === null) {
      inferred = type;
    } else if (
      (inferred === "integer" && type === "real") ||
      (inferred === "real" && type === "integer")
    ) {
      inferred = "real";
    } else {
      return "text";
    }
  }
  return inferred ?? "text";
}

/** Convert a raw cell to the value bound for its column's type. */
export function convertValue(value: RawValue, type: ColumnType): ImportValue {
  if (value === null) return null;
  switch (type) {
    case "integer":
    case "real":
      return typeof value === "number" ? value : Number(value);
    case "boolean":
      return typeof value === "boolean" ? value : String(value).toLowerCase() === "true";
    case "text":
      return String(value);
  }
}

export interface TypedRows {
  columns: ColumnDefinition[];
  rows: ImportValue[][];
}

/** Type every column of a table read from a file, and convert its cells. */
export function typeRows(columns: string[], rows: RawValue[][]): TypedRows {
  const types = columns.map((_, i) => inferColumnType(rows.map((row) => row[i] ?? null)));
  return {
    columns: columns.map((name, i) => ({ name, type: types[i] ?? "text" })),
    rows: rows.map((row) => columns.map((_, i) => convertValue(row[i] ?? null, types[i] ?? "text"))),
  };
}
