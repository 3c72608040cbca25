import chalk from "chalk";
import ora from "ora";
import { resolveConnection, type Configuration } from "../config/index.ts";
import { errorMessage } from "../core/errors.ts";
import { logger } from "../core/logger.ts";
import type { ConnectionManager } from "../db/connections.ts";
import type { Engine } from "../db/types.ts";
import { exportTable } from "../transfer/export.ts";
import { importTable } from "../transfer/import.ts";
import { readStatement } from "./accumulator.ts";
import { classify, type MetaCommand } from "./commands.ts";
import { runSql } from "./execute.ts";
import {
  searchHistory,
  showForeignKeys,
  showHistory,
  showIndexes,
  showSchema,
  showTables,
} from "./handlers.ts";
import { printHelp } from "./help.ts";
import { HistorySession, type HistoryStore } from "./history.ts";
import type { InputSource } from "./input.ts";
import { runScript } from "./script.ts";

export interface SessionOptions {
  configuration: Configuration | null;
  connections: ConnectionManager;
  input: InputSource;
  /** History file for connections that don't name their own. */
  defaultHistoryPath: string;
}

type Outcome = "continue" | "quit";

const NUMBER_FORMAT = new Intl.NumberFormat("en-US");

async function connectWithSpinner(connections: ConnectionManager, url: string): Promise<Engine> {
  // Silent when stdout isn't a terminal
  const spin = ora({ text: `Connecting to ${url} ...`, isSilent: !process.stdout.isTTY });
  spin.start();
  try {
    const engine = await connections.connect(url);
    spin.succeed(`Connected to ${url}`);
    return engine;
  } catch (err) {
    spin.stop();
    throw err;
  }
}

/**
 * One interactive session: the current connection, the row limit and
 * the history of the connection's history file.
 */
export class Session {
  private limit = 0;

  private constructor(
    private engine: Engine,
    private history: HistorySession,
    private readonly opts: SessionOptions,
  ) {}

  /**
   * Connect to `spec` (a URL or configuration section name) and load its
   * history.
   *
   * @throws {AmbiguousConnectionError} if `spec` names several sections
   * @throws {ConnectionError} if the database can't be reached
   * @throws {UserError} if the history file can't be read
   */
  static async open(spec: string, opts: SessionOptions): Promise<Session> {
    const target = resolveConnection(opts.configuration, spec, opts.defaultHistoryPath);
    const engine = await connectWithSpinner(opts.connections, target.url);
    const history = HistorySession.open(target.historyFile);
    opts.input.setHistory?.(history.store.entries());
    return new Session(engine, history, opts);
  }

  get currentEngine(): Engine {
    return this.engine;
  }

  get rowLimit(): number {
    return this.limit;
  }

  get historyStore(): HistoryStore {
    return this.history.store;
  }

  get historyPath(): string {
    return this.history.path;
  }

  get prompt(): string {
    return chalk.cyan.bold(`(${this.engine.kind}) > `);
  }

  get continuationPrompt(): string {
    return chalk.cyan.bold(`(${this.engine.kind}) ? `);
  }

  /**
   * Read and dispatch lines until `.quit` or end of input. The history
   * is saved however the loop ends.
   */
  async run(): Promise<void> {
    try {
      for (;;) {
        const event = await this.opts.input.read(this.prompt);
        if (event.kind === "eof") {
          logger.log();
          break;
        }
        if (event.kind === "interrupt") {
          logger.log();
          continue;
        }

        if (event.text.trim() !== "") this.history.store.append(event.text);
        const outcome = await this.dispatch(event.text);
        this.opts.input.setHistory?.(this.history.store.entries());
        if (outcome === "quit") break;
      }
    } finally {
      this.close();
    }
  }

  /** Handle one line read at the primary prompt. Never throws. */
  async dispatch(line: string): Promise<Outcome> {
    const command = classify(line);
    try {
      return await this.execute(command);
    } catch (err) {
      logger.error(errorMessage(err));
      return "continue";
    }
  }

  /** Save the history. Safe to call more than once. */
  close(): void {
    try {
      this.history.close();
    } catch (err) {
      logger.error(`Unable to save history to "${this.history.path}": ${errorMessage(err)}`);
    }
  }

  private async execute(command: MetaCommand): Promise<Outcome> {
    switch (command.kind) {
      case "empty":
        break;

      case "quit":
        return "quit";

      case "help":
        printHelp(command.topic);
        break;

      case "connect":
        await this.connect(command.spec);
        break;

      case "export":
        await exportTable(this.engine, command.table, command.path);
        break;

      case "import":
        await importTable(this.engine, command.table, command.path, {
          newTableOnly: command.newTableOnly,
        });
        break;

      case "foreign-keys":
        await showForeignKeys(this.engine, command.table);
        break;

      case "indexes":
        await showIndexes(this.engine, command.table);
        break;

      case "limit":
        if (command.value === undefined) {
          logger.log(`Limit is currently ${NUMBER_FORMAT.format(this.limit)}.`);
        } else {
          this.limit = command.value;
        }
        break;

      case "run":
        await runScript(this.engine, command.path);
        break;

      case "schema":
        await showSchema(this.engine, command.table);
        break;

      case "tables":
        await showTables(this.engine, command.pattern);
        break;

      case "url":
        logger.log(this.engine.url);
        break;

      case "history":
        showHistory(this.history.store, command.count);
        break;

      case "history-search":
        searchHistory(this.history.store, command.pattern);
        break;

      case "invalid":
        logger.error(command.message);
        break;

      case "unknown-command":
        logger.error(`"${command.command}" is an unknown "." command.`);
        break;

      case "sql": {
        const result = await readStatement(command.line, this.opts.input, {
          prompt: this.continuationPrompt,
          history: this.history.store,
        });
        if (result.kind === "complete") {
          await runSql(this.engine, result.sql, { limit: this.limit });
        }
        break;
      }
    }
    return "continue";
  }

  /**
   * Switch to another database. The new connection and its history are
   * both opened before anything is swapped: on failure the session is
   * left as it was, on success the old history is saved. Connections
   * sharing a history file keep the open one.
   */
  private async connect(spec: string): Promise<void> {
    const target = resolveConnection(this.opts.configuration, spec, this.opts.defaultHistoryPath);
    const engine = await connectWithSpinner(this.opts.connections, target.url);

    if (target.historyFile !== this.history.path) {
      const history = HistorySession.open(target.historyFile);
      this.close();
      this.history = history;
      this.opts.input.setHistory?.(history.store.entries());
    }
    this.engine = engine;
  }
}
