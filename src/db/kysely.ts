/**
 * PostgreSQL and MySQL engine, on Kysely.
 *
 * Statements typed at the prompt go to the dialect's streaming runner;
 * introspection goes through Kysely's introspector and
 * `information_schema`.
 */
import { sql, type Kysely, type RawBuilder } from "kysely";
import {
  sortTableNames,
  type BackendKind,
  type ColumnDefinition,
  type ColumnType,
  type Engine,
  type ForeignKeyInfo,
  type ImportValue,
  type IndexInfo,
  type StatementResult,
} from "./types.ts";
import type { StatementRunner } from "./collector.ts";

export type KyselyKind = Extract<BackendKind, "mysql" | "postgres">;

const COLUMN_TYPES: Record<KyselyKind, Record<ColumnType, string>> = {
  postgres: { integer: "BIGINT", real: "DOUBLE PRECISION", boolean: "BOOLEAN", text: "TEXT" },
  mysql: { integer: "BIGINT", real: "DOUBLE", boolean: "BOOLEAN", text: "TEXT" },
};

/** Rows per INSERT statement during an import. */
const INSERT_CHUNK = 500;

interface KeyColumnRow {
  name: string;
  type: string;
  column_name: string;
}

interface ForeignKeyRow {
  name: string;
  column_name: string;
  referenced_table: string;
  referenced_column: string;
}

function currentSchema(kind: KyselyKind): RawBuilder<unknown> {
  return kind === "postgres" ? sql`current_schema()` : sql`database()`;
}

export class KyselyEngine implements Engine {
  constructor(
    private readonly db: Kysely<unknown>,
    private readonly runner: StatementRunner,
    public readonly kind: KyselyKind,
    public readonly url: string,
  ) {}

  execute(text: string, limit = 0): Promise<StatementResult> {
    return this.runner.run(text, limit);
  }

  async listTables(): Promise<string[]> {
    const tables = await this.db.introspection.getTables();
    return sortTableNames(tables.filter((t) => !t.isView).map((t) => t.name));
  }

  async listIndexes(table: string): Promise<IndexInfo[]> {
    const { rows } = await sql<KeyColumnRow>`
      SELECT tc.constraint_name AS name, tc.constraint_type AS type, kcu.column_name AS column_name
      FROM information_schema.table_constraints tc
      JOIN information_schema.key_column_usage kcu
        ON kcu.constraint_name = tc.constraint_name
        AND kcu.table_schema = tc.table_schema
        AND kcu.table_name = tc.table_name
      WHERE tc.table_name = ${table}
        AND tc.table_schema = ${currentSchema(this.kind)}
        AND tc.constraint_type IN ('PRIMARY KEY', 'UNIQUE')
      ORDER BY tc.constraint_name, kcu.ordinal_position
    `.execute(this.db);

    const byName = new Map<string, IndexInfo>();
    for (const row of rows) {
      let index = byName.get(row.name);
      if (!index) {
        index = { name: row.name, columns: [], unique: true };
        byName.set(row.name, index);
      }
      index.columns.push(row.column_name);
    }
    return [...byName.values()];
  }

  async listForeignKeys(table: string): Promise<ForeignKeyInfo[]> {
    const query =
      this.kind === "mysql"
        ? sql<ForeignKeyRow>`
            SELECT constraint_name AS name, column_name AS column_name,
              referenced_table_name AS referenced_table, referenced_column_name AS referenced_column
            FROM information_schema.key_column_usage
            WHERE table_name = ${table}
              AND table_schema = database()
              AND referenced_table_name IS NOT NULL
            ORDER BY constraint_name, ordinal_position
          `
        : sql<ForeignKeyRow>`
            SELECT rc.constraint_name AS name, kcu.column_name AS column_name,
              ref.table_name AS referenced_table, ref.column_name AS referenced_column
            FROM information_schema.referential_constraints rc
            JOIN information_schema.key_column_usage kcu
              ON kcu.constraint_name = rc.constraint_name
              AND kcu.constraint_schema = rc.constraint_schema
            JOIN information_schema.key_column_usage ref
              ON ref.constraint_name = rc.unique_constraint_name
              AND ref.constraint_schema = rc.unique_constraint_schema
              AND ref.ordinal_position = kcu.position_in_unique_constraint
            WHERE kcu.table_name = ${table}
              AND kcu.table_schema = current_schema()
            ORDER BY rc.constraint_name, kcu.ordinal_position
          `;
    const { rows } = await query.execute(this.db);

    const byName = new Map<string, ForeignKeyInfo>();
    for (const row of rows) {
      let fk = byName.get(row.name);
      if (!fk) {
        fk = { name: row.name, columns: [], referencedTable: row.referenced_table, referencedColumns: [] };
        byName.set(row.name, fk);
      }
      fk.columns.push(row.column_name);
      fk.referencedColumns.push(row.referenced_column);
    }
    return [...byName.values()];
  }

  async describeTable(table: string): Promise<string> {
    const tables = await this.db.introspection.getTables();
    const meta = tables.find((t) => t.name === table);
    if (!meta) return "";

    const columns = meta.columns.map((c) => {
      let line = `\t${c.name} ${c.dataType}`;
      if (!c.isNullable) line += " NOT NULL";
      return line;
    });
    return `CREATE TABLE ${meta.name} (\n${columns.join(",\n")}\n)`;
  }

  async createTable(table: string, columns: ColumnDefinition[]): Promise<void> {
    const types = COLUMN_TYPES[this.kind];
    const defs = columns.map((c) => sql`${sql.id(c.name)} ${sql.raw(types[c.type])}`);
    await sql`CREATE TABLE ${sql.id(table)} (${sql.join(defs)})`.execute(this.db);
  }

  async insertRows(table: string, columns: string[], rows: ImportValue[][]): Promise<number> {
    if (rows.length === 0) return 0;
    const target = sql`${sql.id(table)} (${sql.join(columns.map((c) => sql.id(c)))})`;

    await this.db.transaction().execute(async (trx) => {
      for (let start = 0; start < rows.length; start += INSERT_CHUNK) {
        const chunk = rows.slice(start, start + INSERT_CHUNK);
        const values = chunk.map((row) => sql`(${sql.join(row)})`);
        await sql`INSERT INTO ${target} VALUES ${sql.join(values)}`.execute(trx);
      }
    });
    return rows.length;
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }
}
