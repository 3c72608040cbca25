/**
 * Introspection and history commands.
 */
import { renderResults } from "../core/format.ts";
import { logger } from "../core/logger.ts";
import { nativeCatalog } from "../db/catalog.ts";
import type { Engine } from "../db/types.ts";
import { formatHistoryItem, type HistoryStore } from "./history.ts";
import { runSql } from "./execute.ts";

const NO_INDEXES = "No indexes.";
const NO_FOREIGN_KEYS = "No foreign keys.";

/**
 * Find a table by name, ignoring case. Reports and returns `null` if
 * there is no such table, or more than one.
 */
export async function findTable(engine: Engine, name: string): Promise<string | null> {
  const lower = name.toLowerCase();
  const matches = (await engine.listTables()).filter((t) => t.toLowerCase() === lower);
  const [match, ...others] = matches;
  if (match === undefined) {
    logger.error(`Table "${name}" does not exist.`);
    return null;
  }
  if (others.length > 0) {
    logger.error(`Too many matches for "${name}": ${matches.join(", ")}`);
    return null;
  }
  return match;
}

export async function showTables(engine: Engine, pattern?: RegExp): Promise<void> {
  for (const table of await engine.listTables()) {
    if (pattern === undefined || pattern.test(table)) logger.log(table);
  }
}

export async function showSchema(engine: Engine, name: string): Promise<void> {
  const table = await findTable(engine, name);
  if (table === null) return;

  const catalog = nativeCatalog(engine.kind);
  if (catalog) {
    await runSql(engine, catalog.schema(table), { echo: true });
    return;
  }

  const ddl = (await engine.describeTable(table)).trim().replace(/\t/g, "  ");
  logger.log(`\n${ddl}\n`);
}

export async function showIndexes(engine: Engine, name: string): Promise<void> {
  const table = await findTable(engine, name);
  if (table === null) return;

  const catalog = nativeCatalog(engine.kind);
  if (catalog) {
    await runSql(engine, catalog.indexes(table), { echo: true, emptyMessage: NO_INDEXES });
    return;
  }

  const rows = (await engine.listIndexes(table)).map((index) => ({
    table,
    name: index.name,
    columns: index.columns.join(", "),
    unique: index.unique ? "true" : "false",
  }));
  renderResults({
    columns: ["table", "name", "columns", "unique"],
    rows,
    limit: 0,
    total: rows.length,
    emptyMessage: NO_INDEXES,
  });
}

export async function showForeignKeys(engine: Engine, name: string): Promise<void> {
  const table = await findTable(engine, name);
  if (table === null) return;

  const catalog = nativeCatalog(engine.kind);
  if (catalog) {
    await runSql(engine, catalog.foreignKeys(table), { echo: true, emptyMessage: NO_FOREIGN_KEYS });
    return;
  }

  const rows = (await engine.listForeignKeys(table)).map((fk) => ({
    name: fk.name ?? "?",
    columns: fk.columns.join(", "),
    references: fk.referencedTable,
    references_columns: fk.referencedColumns.join(", "),
  }));
  renderResults({
    columns: ["name", "columns", "references", "references_columns"],
    rows,
    limit: 0,
    total: rows.length,
    emptyMessage: NO_FOREIGN_KEYS,
  });
}

export function showHistory(history: HistoryStore, count = 0): void {
  for (const item of history.list(count)) logger.log(formatHistoryItem(item));
}

export function searchHistory(history: HistoryStore, pattern: RegExp): void {
  for (const item of history.search(pattern)) logger.log(formatHistoryItem(item));
}
