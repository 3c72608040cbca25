import * as readline from "node:readline";
import { HISTORY_MAX } from "./history.ts";

/** What one read from the terminal produced. */
export type InputEvent =
  | { kind: "line"; text: string }
  | { kind: "eof" }
  | { kind: "interrupt" };

/**
 * Where the command loop reads its lines from. The terminal in normal
 * use; a scripted list of lines in tests.
 */
export interface InputSource {
  read(prompt: string): Promise<InputEvent>;
  /** Replace the lines offered for recall (oldest first). */
  setHistory?(lines: readonly string[]): void;
  close(): void;
}

export type LineCompleter = (line: string) => Promise<readline.CompleterResult>;

export interface ReadlineInputOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  completer?: LineCompleter;
}

/**
 * `InputSource` over `node:readline`.
 *
 * Events are queued, so lines pasted in one go are handed out one read
 * at a time.
 */
export class ReadlineInput implements InputSource {
  private readonly rl: readline.Interface;
  /** Recall list, newest first. readline adds to it as lines are entered. */
  private readonly recall: string[] = [];
  private readonly queue: InputEvent[] = [];
  private waiting: ((event: InputEvent) => void) | null = null;
  private ended = false;

  constructor(opts: ReadlineInputOptions = {}) {
    const input = opts.input ?? process.stdin;
    const completer = opts.completer;

    this.rl = readline.createInterface({
      input,
      output: opts.output ?? process.stdout,
      terminal: process.stdin.isTTY === true && input === process.stdin,
      history: this.recall,
      historySize: HISTORY_MAX,
      completer: completer
        ? (line: string, callback: (err: Error | null, result?: readline.CompleterResult) => void) => {
            completer(line).then(
              (result) => callback(null, result),
              (err: unknown) => callback(err instanceof Error ? err : new Error(String(err))),
            );
          }
        : undefined,
    });

    this.rl.on("line", (text) => this.push({ kind: "line", text }));
    this.rl.on("SIGINT", () => {
      // Drop whatever was typed on the current line
      this.rl.write(null, { ctrl: true, name: "e" });
      this.rl.write(null, { ctrl: true, name: "u" });
      this.push({ kind: "interrupt" });
    });
    this.rl.on("close", () => {
      this.ended = true;
      this.push({ kind: "eof" });
    });
  }

  read(prompt: string): Promise<InputEvent> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.ended) return Promise.resolve({ kind: "eof" });

    this.rl.setPrompt(prompt);
    this.rl.prompt();
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  setHistory(lines: readonly string[]): void {
    this.recall.splice(0, this.recall.length, ...[...lines].reverse());
  }

  close(): void {
    if (!this.ended) this.rl.close();
  }

  private push(event: InputEvent): void {
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting(event);
    } else {
      this.queue.push(event);
    }
  }
}
