import type { BackendKind } from "./types.ts";

/**
 * Backend-specific introspection queries. Where a backend has one, the
 * shell runs it (echoed, like any statement) in preference to the
 * engine's generic introspection, since the native output carries more
 * detail.
 */
export interface NativeCatalog {
  schema(table: string): string;
  indexes(table: string): string;
  foreignKeys(table: string): string;
}

function literal(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function backtick(name: string): string {
  return `\`${name.replace(/`/g, "``")}\``;
}

const sqlite: NativeCatalog = {
  schema: (table) => `pragma table_info(${literal(table)})`,
  indexes: (table) =>
    `select * from sqlite_master where type = 'index' and tbl_name = ${literal(table)}`,
  foreignKeys: (table) => `pragma foreign_key_list(${literal(table)})`,
};

const mysql: NativeCatalog = {
  schema: (table) => `desc ${backtick(table)}`,
  indexes: (table) => `show index from ${backtick(table)}`,
  // "table", "column" and "database" are reserved words
  foreignKeys: (table) =>
    "select constraint_name as name, " +
    'constraint_schema as "database", ' +
    'table_name as "table", ' +
    'column_name as "column", ' +
    "table_schema as referenced_database, " +
    "referenced_table_name as references_table, " +
    "referenced_column_name as references_column " +
    "from information_schema.key_column_usage " +
    "where referenced_table_schema = (select database()) and " +
    `table_name = ${literal(table)}`,
};

const postgres: NativeCatalog = {
  schema: (table) =>
    "select column_name, data_type, character_maximum_length, " +
    "is_nullable, column_default from information_schema.columns " +
    `where table_name = ${literal(table)}`,
  indexes: (table) => `select * from pg_indexes where tablename = ${literal(table)}`,
  foreignKeys: (table) =>
    "SELECT conname AS constraint_name, " +
    "conrelid::regclass AS table_name, " +
    "a.attname AS column_name, " +
    "confrelid::regclass AS foreign_table_name, " +
    "af.attname AS foreign_column_name " +
    "FROM pg_constraint AS c " +
    "JOIN pg_attribute AS a ON a.attnum = ANY(c.conkey) AND a.attrelid = c.conrelid " +
    "JOIN pg_class AS cl ON cl.oid = c.conrelid " +
    "JOIN pg_namespace AS nsp ON nsp.oid = cl.relnamespace " +
    "JOIN pg_attribute AS af ON af.attnum = ANY(c.confkey) AND af.attrelid = c.confrelid " +
    "WHERE c.contype = 'f' " +
    `AND cl.relname = ${literal(table)} ` +
    "AND nsp.nspname = 'public'",
};

const CATALOGS: Partial<Record<BackendKind, NativeCatalog>> = { sqlite, mysql, postgres };

/** The native catalog for a backend, or `undefined` to use generic introspection. */
export function nativeCatalog(kind: BackendKind): NativeCatalog | undefined {
  return CATALOGS[kind];
}
