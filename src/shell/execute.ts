import { performance } from "node:perf_hooks";
import { renderResults } from "../core/format.ts";
import { logger } from "../core/logger.ts";
import { errorMessage } from "../core/errors.ts";
import type { Engine } from "../db/types.ts";

export interface RunSqlOptions {
  /** Row limit, 0 for unlimited. */
  limit?: number;
  /** Print the statement before running it. */
  echo?: boolean;
  /** Printed instead of a grid when the statement returns no rows. */
  emptyMessage?: string;
}

/**
 * Run one statement and show its results. Statements without a result
 * set (DDL, most writes) succeed quietly.
 *
 * Errors are reported, not thrown. Returns whether the statement ran.
 */
export async function runSql(engine: Engine, sql: string, opts: RunSqlOptions = {}): Promise<boolean> {
  const limit = opts.limit ?? 0;
  try {
    if (opts.echo) logger.log(`${sql}\n`);

    const start = performance.now();
    const result = await engine.execute(sql, limit);
    const elapsedSeconds = (performance.now() - start) / 1000;

    if (result.kind === "none") return true;

    renderResults({
      columns: result.columns,
      rows: result.rows,
      limit,
      total: result.total,
      elapsedSeconds,
      emptyMessage: opts.emptyMessage,
    });
    return true;
  } catch (err) {
    logger.error(errorMessage(err));
    return false;
  }
}
