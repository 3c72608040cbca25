import { existsSync, readFileSync, statSync } from "node:fs";
import { extname } from "node:path";
import { logger } from "../core/logger.ts";
import type { Engine } from "../db/types.ts";
import { expandHome } from "../utils/env.ts";
import { runSql } from "./execute.ts";
import { keepLine, PendingStatement } from "./statement.ts";

interface ScriptLines {
  /** 1-based line number of `lines[0]` in the file; 0 if there are none. */
  firstLine: number;
  lines: string[];
}

/** Drop leading and trailing blank and comment lines. */
export function trimScript(lines: string[]): ScriptLines {
  const start = lines.findIndex((line) => keepLine(line, null));
  if (start === -1) return { firstLine: 0, lines: [] };

  let end = lines.length;
  while (end > start && !keepLine(lines[end - 1] ?? "", null)) end--;
  return { firstLine: start + 1, lines: lines.slice(start, end) };
}

/**
 * Run every statement in a `.sql` file, echoing each one. Statements
 * may span lines. Stops at the first statement that fails.
 *
 * Returns whether every statement ran.
 */
export async function runScript(engine: Engine, path: string): Promise<boolean> {
  const file = expandHome(path);
  if (!existsSync(file) || !statSync(file).isFile()) {
    logger.error(`File "${file}" does not exist or is not a regular file.`);
    return false;
  }
  if (extname(file).toLowerCase() !== ".sql") {
    logger.error(`File "${file}" does not end with ".sql".`);
    return false;
  }

  const text = readFileSync(file, "utf-8");
  const { firstLine, lines } = trimScript(text.split(/\r?\n/));
  if (firstLine === 0) {
    logger.error(`"${file}" contains no SQL statements.`);
    return false;
  }

  const pending = new PendingStatement();
  let statementLine = firstLine;

  for (const [offset, line] of lines.entries()) {
    if (pending.isEmpty) statementLine = firstLine + offset;
    if (!pending.add(line)) continue;

    if (pending.complete) {
      const ok = await runSql(engine, pending.text, { limit: 0, echo: true });
      if (!ok) return false;
      pending.reset();
    }
  }

  if (!pending.isEmpty) {
    logger.error(`"${file}", line ${statementLine}: File ended with an incomplete SQL statement.`);
    return false;
  }
  return true;
}
