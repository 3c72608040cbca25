import { errorMessage } from "../core/errors.ts";
import { splitShellWords } from "./tokenize.ts";

/** Dot-command keywords. Matching is case-sensitive. */
export const Command = {
  CONNECT: ".connect",
  EXPORT: ".export",
  FKEYS: ".fk",
  HELP1: ".help",
  HELP2: "?",
  HISTORY: ".history",
  IMPORT: ".import",
  INDEXES: ".indexes",
  LIMIT: ".limit",
  QUIT1: ".exit",
  QUIT2: ".quit",
  RUN: ".run",
  SCHEMA: ".schema",
  TABLES: ".tables",
  URL: ".url",
} as const;

/** `.import` flag: fail if the table already exists. */
export const IMPORT_NEW_TABLE_ONLY = "-n";

const DIGITS = /^\d+$/;

/** One classified input line. */
export type MetaCommand =
  | { kind: "empty" }
  | { kind: "quit" }
  | { kind: "help"; topic?: string }
  | { kind: "connect"; spec: string }
  | { kind: "export"; table: string; path: string }
  | { kind: "import"; table: string; path: string; newTableOnly: boolean }
  | { kind: "foreign-keys"; table: string }
  | { kind: "indexes"; table: string }
  | { kind: "limit"; value?: number }
  | { kind: "run"; path: string }
  | { kind: "schema"; table: string }
  | { kind: "tables"; pattern?: RegExp }
  | { kind: "url" }
  /** `count` of 0 lists every entry. */
  | { kind: "history"; count: number }
  | { kind: "history-search"; pattern: RegExp }
  | { kind: "invalid"; message: string }
  | { kind: "unknown-command"; command: string }
  | { kind: "sql"; line: string };

function invalid(message: string): MetaCommand {
  return { kind: "invalid", message };
}

/**
 * Re-split the whole line with shell quoting and compile its single
 * argument as a pattern.
 */
function compilePattern(line: string, flags: string): RegExp | string {
  let tokens: string[];
  try {
    tokens = splitShellWords(line);
  } catch (err) {
    return errorMessage(err);
  }
  const [, source, ...extra] = tokens;
  if (source === undefined || extra.length > 0) return "Too many parameters.";

  try {
    return new RegExp(source, flags);
  } catch (err) {
    return `Bad regular expression: ${errorMessage(err)}`;
  }
}

/**
 * Classify one line read at the primary prompt.
 *
 * Never throws: malformed commands come back as `invalid` with the
 * message to show.
 */
export function classify(line: string): MetaCommand {
  const tokens = line.trim().split(/\s+/).filter((t) => t !== "");
  const [cmd, ...args] = tokens;
  if (cmd === undefined) return { kind: "empty" };

  switch (cmd) {
    case Command.QUIT1:
    case Command.QUIT2:
      return args.length === 0
        ? { kind: "quit" }
        : invalid(`${Command.QUIT1} and ${Command.QUIT2} take no parameters.`);

    case Command.HELP1:
    case Command.HELP2:
      if (args.length > 1) {
        return invalid(`${Command.HELP1} and ${Command.HELP2} take at most one parameter.`);
      }
      return args[0] === undefined ? { kind: "help" } : { kind: "help", topic: args[0] };

    case Command.CONNECT: {
      const [spec] = args;
      return spec !== undefined && args.length === 1
        ? { kind: "connect", spec }
        : invalid(`Usage: ${Command.CONNECT} <db_spec>`);
    }

    case Command.EXPORT: {
      const [table, path] = args;
      return table !== undefined && path !== undefined && args.length === 2
        ? { kind: "export", table, path }
        : invalid(`Usage: ${Command.EXPORT} <table> <path>`);
    }

    case Command.FKEYS: {
      const [table] = args;
      return table !== undefined && args.length === 1
        ? { kind: "foreign-keys", table }
        : invalid(`Usage: ${Command.FKEYS} <table_name>`);
    }

    case Command.IMPORT: {
      const usage = invalid(`Usage: ${Command.IMPORT} [${IMPORT_NEW_TABLE_ONLY}] <table> <path>`);
      if (args.length === 2) {
        const [table, path] = args;
        if (table === undefined || path === undefined || table === IMPORT_NEW_TABLE_ONLY) {
          return usage;
        }
        return { kind: "import", table, path, newTableOnly: false };
      }
      if (args.length === 3) {
        const [flag, table, path] = args;
        if (flag !== IMPORT_NEW_TABLE_ONLY || table === undefined || path === undefined) {
          return usage;
        }
        return { kind: "import", table, path, newTableOnly: true };
      }
      return usage;
    }

    case Command.INDEXES: {
      const [table] = args;
      return table !== undefined && args.length === 1
        ? { kind: "indexes", table }
        : invalid(`Usage: ${Command.INDEXES} <table_name>`);
    }

    case Command.LIMIT: {
      const [value] = args;
      if (value === undefined) return { kind: "limit" };
      if (args.length > 1) return invalid(`Usage: ${Command.LIMIT} [<n>]`);
      if (!DIGITS.test(value)) return invalid(`${Command.LIMIT} takes a non-negative integer`);
      return { kind: "limit", value: Number.parseInt(value, 10) };
    }

    case Command.RUN: {
      const [path] = args;
      return path !== undefined && args.length === 1
        ? { kind: "run", path }
        : invalid(`Usage: ${Command.RUN} <path>`);
    }

    case Command.SCHEMA: {
      const [table] = args;
      return table !== undefined && args.length === 1
        ? { kind: "schema", table }
        : invalid(`Usage: ${Command.SCHEMA} <table_name>`);
    }

    case Command.TABLES: {
      if (args.length === 0) return { kind: "tables" };
      const pattern = compilePattern(line, "i");
      return typeof pattern === "string" ? invalid(pattern) : { kind: "tables", pattern };
    }

    case Command.URL:
      return args.length === 0 ? { kind: "url" } : invalid(`${Command.URL} takes no arguments.`);

    case Command.HISTORY: {
      const [first] = args;
      if (first === undefined) return { kind: "history", count: 0 };
      if (args.length === 1 && DIGITS.test(first)) {
        return { kind: "history", count: Number.parseInt(first, 10) };
      }
      const pattern = compilePattern(line, "");
      return typeof pattern === "string" ? invalid(pattern) : { kind: "history-search", pattern };
    }

    default:
      if (cmd.startsWith(".")) return { kind: "unknown-command", command: cmd };
      return { kind: "sql", line };
  }
}
