import type { CompleterResult } from "node:readline";
import { Command } from "./commands.ts";

const COMMANDS: readonly string[] = Object.values(Command);
const TABLE_COMMANDS: ReadonlySet<string> = new Set<string>([Command.SCHEMA, Command.INDEXES, Command.FKEYS]);
const HELP_COMMANDS: ReadonlySet<string> = new Set<string>([Command.HELP1, Command.HELP2]);

/**
 * Tab completion: dot-commands in first position, table names after
 * `.schema`, `.indexes` and `.fk`, and command names after `.help`.
 * SQL is not completed.
 */
export async function completeLine(
  line: string,
  listTables: () => Promise<string[]>,
): Promise<CompleterResult> {
  const words = line.trimStart().split(/\s+/);
  const [first = "", second, ...rest] = words;

  if (second === undefined) {
    return [COMMANDS.filter((c) => c.startsWith(first)), first];
  }
  if (rest.length > 0) return [[], words[words.length - 1] ?? ""];

  if (TABLE_COMMANDS.has(first)) {
    const prefix = second.toLowerCase();
    const tables = await listTables();
    return [tables.filter((t) => t.toLowerCase().startsWith(prefix)), second];
  }
  if (HELP_COMMANDS.has(first)) {
    return [COMMANDS.filter((c) => c.startsWith(second)), second];
  }
  return [[], second];
}
