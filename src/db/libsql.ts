/**
 * SQLite and libSQL engine.
 *
 * Uses `@libsql/client`, which serves local files, in-memory databases,
 * and remote libSQL servers through the same client.
 */
import { createClient, type Client, type InStatement, type ResultSet } from "@libsql/client";
import {
  sortTableNames,
  type BackendKind,
  type ColumnDefinition,
  type ColumnType,
  type Engine,
  type ForeignKeyInfo,
  type ImportValue,
  type IndexInfo,
  type Row,
  type StatementResult,
} from "./types.ts";
import { RowCollector } from "./collector.ts";

const COLUMN_TYPES: Record<ColumnType, string> = {
  integer: "INTEGER",
  real: "REAL",
  boolean: "INTEGER",
  text: "TEXT",
};

/** Quote an identifier with double quotes. */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/** Convert a libSQL result set into row mappings, keeping at most `limit`. */
export function toStatementResult(result: ResultSet, limit = 0): StatementResult {
  if (result.columns.length === 0) {
    return { kind: "none", rowsAffected: result.rowsAffected };
  }
  const columns = [...result.columns];
  const collector = new RowCollector(limit);
  for (const row of result.rows) {
    const mapped: Row = {};
    columns.forEach((col, i) => {
      mapped[col] = row[i] ?? null;
    });
    collector.add(mapped);
  }
  return collector.result(columns);
}

export class LibsqlEngine implements Engine {
  constructor(
    private readonly client: Client,
    public readonly kind: BackendKind,
    public readonly url: string,
  ) {}

  async execute(sql: string, limit = 0): Promise<StatementResult> {
    // batch() wraps the statement in BEGIN ... COMMIT on the same connection
    const [result] = await this.client.batch([sql], "write");
    if (!result) return { kind: "none", rowsAffected: 0 };
    return toStatementResult(result, limit);
  }

  async listTables(): Promise<string[]> {
    const result = await this.client.execute(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%'",
    );
    return sortTableNames(result.rows.map((row) => String(row[0])));
  }

  async listIndexes(table: string): Promise<IndexInfo[]> {
    const list = await this.client.execute({
      sql: "SELECT name, \"unique\" FROM pragma_index_list(?) WHERE origin = 'c' ORDER BY name",
      args: [table],
    });

    const indexes: IndexInfo[] = [];
    for (const row of list.rows) {
      const name = String(row[0]);
      const info = await this.client.execute({
        sql: "SELECT name FROM pragma_index_info(?) ORDER BY seqno",
        args: [name],
      });
      indexes.push({
        name,
        columns: info.rows.map((r) => String(r[0])),
        unique: Number(row[1]) === 1,
      });
    }
    return indexes;
  }

  async listForeignKeys(table: string): Promise<ForeignKeyInfo[]> {
    const result = await this.client.execute({
      sql: 'SELECT id, "table", "from", "to" FROM pragma_foreign_key_list(?) ORDER BY id, seq',
      args: [table],
    });

    const byId = new Map<number, ForeignKeyInfo>();
    for (const row of result.rows) {
      const id = Number(row[0]);
      let fk = byId.get(id);
      if (!fk) {
        fk = { name: null, columns: [], referencedTable: String(row[1]), referencedColumns: [] };
        byId.set(id, fk);
      }
      fk.columns.push(String(row[2]));
      // "to" is NULL when the key references the parent's primary key
      if (row[3] !== null) fk.referencedColumns.push(String(row[3]));
    }
    return [...byId.values()];
  }

  async describeTable(table: string): Promise<string> {
    const result = await this.client.execute({
      sql: "SELECT sql FROM sqlite_master WHERE type = 'table' AND name = ?",
      args: [table],
    });
    const ddl = result.rows[0]?.[0];
    return ddl === null || ddl === undefined ? "" : String(ddl);
  }

  async createTable(table: string, columns: ColumnDefinition[]): Promise<void> {
    const defs = columns.map((c) => `${quoteIdent(c.name)} ${COLUMN_TYPES[c.type]}`);
    await this.client.execute(`CREATE TABLE ${quoteIdent(table)} (${defs.join(", ")})`);
  }

  async insertRows(table: string, columns: string[], rows: ImportValue[][]): Promise<number> {
    if (rows.length === 0) return 0;
    const sql =
      `INSERT INTO ${quoteIdent(table)} (${columns.map(quoteIdent).join(", ")}) ` +
      `VALUES (${columns.map(() => "?").join(", ")})`;
    const statements: InStatement[] = rows.map((args) => ({ sql, args }));
    await this.client.batch(statements, "write");
    return rows.length;
  }

  async close(): Promise<void> {
    this.client.close();
  }
}

/**
 * Create a SQLite or libSQL engine.
 *
 * @example
 * ```ts
 * const engine = createLibsqlEngine("file:data.db", "sqlite", "sqlite:///data.db");
 * const engine = createLibsqlEngine(":memory:", "sqlite", "sqlite://");
 * ```
 */
export function createLibsqlEngine(driverUrl: string, kind: BackendKind, url: string): LibsqlEngine {
  return new LibsqlEngine(createClient({ url: driverUrl }), kind, url);
}
