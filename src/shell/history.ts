import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { errorMessage, UserError } from "../core/errors.ts";
import { logger } from "../core/logger.ts";

/** Entries kept in memory and written on save. */
export const HISTORY_MAX = 10_000;

export interface HistoryItem {
  /** 1-based position in the history. */
  index: number;
  line: string;
}

/** `    7. select 1;` */
export function formatHistoryItem(item: HistoryItem): string {
  return `${String(item.index).padStart(5)}. ${item.line}`;
}

/**
 * Input history, oldest entry first. Indexes are 1-based.
 */
export class HistoryStore {
  private lines: string[];

  constructor(lines: string[] = []) {
    this.lines = lines.filter((line) => line.trim() !== "").slice(-HISTORY_MAX);
  }

  /** Load a history file. A missing file is an empty history. */
  static load(path: string): HistoryStore {
    if (!existsSync(path)) return new HistoryStore();
    return new HistoryStore(readFileSync(path, "utf-8").split(/\r?\n/));
  }

  get count(): number {
    return this.lines.length;
  }

  entries(): readonly string[] {
    return this.lines;
  }

  get(index: number): string | undefined {
    if (index < 1) return undefined;
    return this.lines[index - 1];
  }

  append(line: string): void {
    this.lines.push(line);
    if (this.lines.length > HISTORY_MAX) this.lines.shift();
  }

  removeLast(): string | undefined {
    return this.lines.pop();
  }

  /**
   * Every entry except the newest, which is the command asking for the
   * listing. With `count > 0`, only the last `count` of those.
   */
  list(count = 0): HistoryItem[] {
    const items = this.lines.slice(0, -1).map((line, i) => ({ index: i + 1, line }));
    return count > 0 ? items.slice(-count) : items;
  }

  /** Every entry matching `pattern`, the newest included. */
  search(pattern: RegExp): HistoryItem[] {
    const items: HistoryItem[] = [];
    this.lines.forEach((line, i) => {
      pattern.lastIndex = 0;
      if (pattern.test(line)) items.push({ index: i + 1, line });
    });
    return items;
  }

  save(path: string): void {
    const dir = dirname(path);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    const lines = this.lines.slice(-HISTORY_MAX);
    writeFileSync(path, lines.length === 0 ? "" : lines.join("\n") + "\n", "utf-8");
  }
}

/**
 * A history store bound to its file. Opening loads the file; closing
 * saves it, once.
 */
export class HistorySession {
  private closed = false;

  private constructor(
    public readonly path: string,
    public readonly store: HistoryStore,
  ) {}

  /** @throws {UserError} if the file exists but can't be read */
  static open(path: string): HistorySession {
    logger.log(`Loading history from "${path}".`);
    try {
      return new HistorySession(path, HistoryStore.load(path));
    } catch (err) {
      throw new UserError(`Unable to load history from "${path}": ${errorMessage(err)}`);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.store.save(this.path);
  }
}
