/**
 * Row collection for streamed results.
 *
 * Every row is counted, only the first `limit` are kept. A limit of 0
 * keeps everything.
 */
import type { Row, StatementResult } from "./types.ts";

export class RowCollector {
  readonly rows: Row[] = [];
  total = 0;

  constructor(private readonly limit = 0) {}

  add(row: Row): void {
    this.total += 1;
    if (this.limit === 0 || this.rows.length < this.limit) this.rows.push(row);
  }

  result(columns: string[]): StatementResult {
    return { kind: "rows", columns, rows: this.rows, total: this.total };
  }
}

/** Runs one statement in its own transaction, streaming rows into a collector. */
export interface StatementRunner {
  run(text: string, limit: number): Promise<StatementResult>;
}
