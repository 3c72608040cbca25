import type { InputEvent, InputSource } from "../shell/input.ts";

/**
 * `InputSource` that replays a fixed script. Strings are typed lines.
 * Once the script runs out every read is end of input.
 */
export class ScriptedInput implements InputSource {
  readonly prompts: string[] = [];
  recall: readonly string[] = [];
  closed = false;
  private readonly events: InputEvent[];

  constructor(script: Array<string | InputEvent>) {
    this.events = script.map((item): InputEvent => (typeof item === "string" ? { kind: "line", text: item } : item));
  }

  async read(prompt: string): Promise<InputEvent> {
    this.prompts.push(prompt);
    return this.events.shift() ?? { kind: "eof" };
  }

  setHistory(lines: readonly string[]): void {
    this.recall = [...lines];
  }

  close(): void {
    this.closed = true;
  }
}

export const EOF: InputEvent = { kind: "eof" };
export const INTERRUPT: InputEvent = { kind: "interrupt" };
