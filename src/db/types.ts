/**
 * Database engine types.
 *
 * An `Engine` is one open connection (or pool) to a database. The shell
 * only talks to databases through this interface, so every backend gets
 * the same commands and the same output.
 */

/**
 * Backend kinds. `sqlite`, `mysql` and `postgres` have native
 * introspection queries; `libsql` (remote libSQL servers) goes through
 * the engine's generic calls.
 */
export type BackendKind = "sqlite" | "libsql" | "mysql" | "postgres";

/** A result row, keyed by column name. Values may be `null`. */
export type Row = Record<string, unknown>;

/**
 * Outcome of a statement. Writes and DDL produce no result set, which
 * is a normal outcome rather than an error.
 *
 * `total` counts every row the statement returned; `rows` holds at most
 * the limit the statement ran with.
 */
export type StatementResult =
  | { kind: "rows"; columns: string[]; rows: Row[]; total: number }
  | { kind: "none"; rowsAffected: number };

export interface IndexInfo {
  name: string;
  columns: string[];
  unique: boolean;
}

export interface ForeignKeyInfo {
  /** SQLite foreign keys are unnamed. */
  name: string | null;
  columns: string[];
  referencedTable: string;
  referencedColumns: string[];
}

/** Column types inferred for imported data. */
export type ColumnType = "integer" | "real" | "boolean" | "text";

export interface ColumnDefinition {
  name: string;
  type: ColumnType;
}

/** A value that can be bound into an INSERT. */
export type ImportValue = string | number | boolean | null;

export interface Engine {
  readonly kind: BackendKind;
  readonly url: string;

  /**
   * Run one statement inside its own transaction, committed before
   * returning. Keeps at most `limit` rows (0 for all) but counts them all.
   */
  execute(sql: string, limit?: number): Promise<StatementResult>;

  /** Table names, sorted case-insensitively. */
  listTables(): Promise<string[]>;
  listIndexes(table: string): Promise<IndexInfo[]>;
  listForeignKeys(table: string): Promise<ForeignKeyInfo[]>;
  /** `CREATE TABLE` text for a table. */
  describeTable(table: string): Promise<string>;

  createTable(table: string, columns: ColumnDefinition[]): Promise<void>;
  /** Insert rows in one transaction. Returns the number of rows inserted. */
  insertRows(table: string, columns: string[], rows: ImportValue[][]): Promise<number>;

  close(): Promise<void>;
}

/** Sort table names the way every engine reports them. */
export function sortTableNames(names: string[]): string[] {
  return [...names].sort((a, b) => {
    const x = a.toLowerCase();
    const y = b.toLowerCase();
    return x < y ? -1 : x > y ? 1 : 0;
  });
}
