import { logger } from "../core/logger.ts";
import { NAME } from "../core/version.ts";
import { Command, IMPORT_NEW_TABLE_ONLY } from "./commands.ts";

export interface HelpTopic {
  commands: readonly string[];
  usage: string;
  /** Newlines and runs of spaces collapse to single spaces when printed. */
  help: string;
}

const DEFAULT_SCREEN_WIDTH = 79;
const SEPARATOR = " - ";

export const HELP_TOPICS: readonly HelpTopic[] = [
  {
    commands: [Command.QUIT1, Command.QUIT2],
    usage: `${Command.QUIT1} or ${Command.QUIT2} or Ctrl-D`,
    help: `Quit ${NAME}.`,
  },
  {
    commands: [Command.CONNECT],
    usage: `${Command.CONNECT} <name>`,
    help: `
Connect to a different database. <name> is either a full database URL or the
name of a section in the configuration file. If <name> is a configuration file
section, you only need to specify enough of the string to be unique. If it's
not unique, you'll see an error message, and the current database will not be
changed.`,
  },
  {
    commands: [Command.EXPORT],
    usage: `${Command.EXPORT} <table> <path>`,
    help: `
Export the contents of table to a file. If <path> ends in ".csv", the table
will be exported to a CSV file. If <path> ends in ".json", the table will be
dumped in JSON Lines format, with each row as a JSON object in the file. You
can use ~ in your paths as a shorthand for your home directory
(e.g., "~/table.json").`,
  },
  {
    commands: [Command.FKEYS],
    usage: `${Command.FKEYS} <table_name>`,
    help: `
Display the list of foreign keys for a table. Note: <table_name> is the table
with the foreign key constraints, not the table the foreign key(s) reference.`,
  },
  {
    commands: [Command.HELP1, Command.HELP2],
    usage: `${Command.HELP1} or ${Command.HELP2} [<command>]`,
    help: "Show help for <command>. If <command> is omitted, show help for all commands.",
  },
  {
    commands: [Command.HISTORY],
    usage: `${Command.HISTORY} [<n> | <re>]`,
    help: String.raw`
Show the history. If <n>, an integer, is supplied, show the last <n> history
items. An <n> of 0 is the same as omitting <n>. If <re> is supplied, show all
history items that match the regular expression <re>. If your pattern contains
spaces or regular expression backslash sequences (e.g., \s), be sure to enclose
it in quotes.`,
  },
  {
    commands: [Command.IMPORT],
    usage: `${Command.IMPORT} [${IMPORT_NEW_TABLE_ONLY}] <table> <path>`,
    help: `
Import a CSV or JSON file into a table. If the table exists, ${Command.IMPORT}
will try to append to it. If the table doesn't exist, it will be created. If
${IMPORT_NEW_TABLE_ONLY} (for "new-only") is specified, the table must not
already exist; the command will abort if it does. If <path> ends in ".csv",
the file is assumed to be a CSV file whose first row holds the column names.
If <path> ends in ".json", the file is assumed to be a JSON Lines file, as if
it were produced by the ${Command.EXPORT} command. You can use ~ as a shorthand
for your home directory. Column types (integer, real, boolean or text) are
inferred from the data; a column holding only empty values becomes text.
Primary and foreign keys are not created. If you need them, precreate an
empty table with appropriate constraints before importing the file. On
import, all column names are forced to lower case, so that column names
don't require quoting in databases like Postgres.`,
  },
  {
    commands: [Command.INDEXES],
    usage: `${Command.INDEXES} <table_name>`,
    help: `
Display the indexes for <table_name>. Uses database-native commands, where
possible. Otherwise, generic index information is displayed.`,
  },
  {
    commands: [Command.LIMIT],
    usage: `${Command.LIMIT} [<n>]`,
    help: `
Show only <n> rows from a SELECT. 0 means unlimited. If <n> is omitted, show
the current ${Command.LIMIT} setting.`,
  },
  {
    commands: [Command.RUN],
    usage: `${Command.RUN} <path>`,
    help: `
Run a SQL script file. The file can contain multiple SQL statements, and each
statement can be on a single line or span multiple lines. SQL statements in
the file must end with an unquoted ";". Newlines in SQL statements are not
preserved and will be replaced with a single space. Multi-line statements will
be sent to the database as a single SQL statement, which will be echoed to the
screen as it is run. Note that the path must end in ".sql", or it will not be
run. In the path, you can use ~ as a shorthand for your home directory.`,
  },
  {
    commands: [Command.SCHEMA],
    usage: `${Command.SCHEMA} <table>`,
    help: "Show the schema for table <table>.",
  },
  {
    commands: [Command.TABLES],
    usage: `${Command.TABLES} [<re>]`,
    help: String.raw`
List the names of all tables in the database. If <re> is supplied, show only
the tables that match the specified regular expression. Matching is case-blind.
If your pattern contains spaces or regular expression backslash sequences
(e.g., \s), be sure to enclose it in quotes.`,
  },
  {
    commands: [Command.URL],
    usage: Command.URL,
    help: "Show the current database URL.",
  },
];

export const HELP_EPILOG: readonly string[] = [
  'Anything else is interpreted as SQL. SQL statements must end with a ";", ' +
    "and multi-line input is supported. Newlines are not preserved, and a " +
    "multi-line statement is sent to the database and written to the history " +
    "as a single line.",
  "",
  "Note that you can use tab-completion on the dot-commands. Also, as a " +
    "special case, you can tab-complete available table names after typing " +
    `"${Command.SCHEMA}", "${Command.INDEXES}" or "${Command.FKEYS}". Completion ` +
    "for SQL statements is not available.",
];

/** Screen width from `COLUMNS`, falling back to 79. */
export function screenWidth(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.COLUMNS;
  if (raw === undefined) return DEFAULT_SCREEN_WIDTH;
  const width = Number.parseInt(raw, 10);
  return Number.isNaN(width) || width <= 0 ? DEFAULT_SCREEN_WIDTH : width;
}

function collapse(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

/**
 * Greedy word wrap. A word longer than `width` is broken across lines.
 */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = "";

  for (let word of collapse(text).split(" ")) {
    if (word === "") continue;
    while (word.length > width) {
      if (current !== "") {
        lines.push(current);
        current = "";
      }
      lines.push(word.slice(0, width));
      word = word.slice(width);
    }
    if (current === "") {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current = `${current} ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current !== "") lines.push(current);
  return lines;
}

/**
 * Format help for every topic, or for the topics listing `command`.
 * Returns `null` if no topic lists `command`.
 */
export function formatHelp(command?: string, width = screenWidth()): string[] | null {
  const topics =
    command === undefined ? HELP_TOPICS : HELP_TOPICS.filter((t) => t.commands.includes(command));
  if (topics.length === 0) return null;

  const usageWidth = Math.max(...topics.map((t) => t.usage.length));
  // 1-character right margin
  let textWidth = width - 1 - SEPARATOR.length - usageWidth;
  if (textWidth <= 0) textWidth = Math.floor(DEFAULT_SCREEN_WIDTH / 2);

  const out: string[] = [];
  const indent = " ".repeat(usageWidth + SEPARATOR.length);
  for (const topic of topics) {
    const [first = "", ...rest] = wrapText(topic.help, textWidth);
    out.push(`${topic.usage.padEnd(usageWidth)}${SEPARATOR}${first}`);
    for (const line of rest) out.push(`${indent}${line}`);
  }

  if (command === undefined) {
    out.push("");
    for (const paragraph of HELP_EPILOG) {
      if (paragraph === "") out.push("");
      else out.push(...wrapText(paragraph, width));
    }
  }
  return out;
}

/** Print help, or an error for an unknown command. */
export function printHelp(command?: string): void {
  const lines = formatHelp(command);
  if (lines === null) {
    logger.error(`Unknown command "${command}".`);
    return;
  }
  for (const line of lines) logger.log(line);
}
