import { logger } from "../core/logger.ts";
import type { HistoryStore } from "./history.ts";
import type { InputSource } from "./input.ts";
import { PendingStatement } from "./statement.ts";

export type ReadResult = { kind: "complete"; sql: string } | { kind: "aborted" };

export interface ReadStatementOptions {
  /** Continuation prompt. */
  prompt: string;
  history?: HistoryStore;
}

/**
 * Read the rest of a statement that starts with `firstLine`, pulling
 * continuation lines from `input` until the statement is complete.
 *
 * The raw first line already in the history is replaced by the whole
 * statement on one line once it completes. End of input or an
 * interrupt abandons the statement and records nothing.
 */
export async function readStatement(
  firstLine: string,
  input: InputSource,
  opts: ReadStatementOptions,
): Promise<ReadResult> {
  const pending = new PendingStatement();
  pending.add(firstLine);
  opts.history?.removeLast();

  while (!pending.complete) {
    const event = await input.read(opts.prompt);
    if (event.kind !== "line") {
      logger.log();
      return { kind: "aborted" };
    }
    pending.add(event.text);
  }

  opts.history?.append(pending.text);
  return { kind: "complete", sql: pending.text };
}
