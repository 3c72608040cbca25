import { vi } from "vitest";

export interface CapturedOutput {
  /** Lines written to stdout through `console.log`. */
  out: string[];
  /** Lines written to stderr through `console.error`. */
  err: string[];
}

function join(args: unknown[]): string {
  return args.map(String).join(" ");
}

/** Run `fn`, collecting what it logs. */
export async function captureOutput(fn: () => unknown): Promise<CapturedOutput> {
  const captured: CapturedOutput = { out: [], err: [] };
  const log = vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    captured.out.push(join(args));
  });
  const error = vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
    captured.err.push(join(args));
  });
  try {
    await fn();
  } finally {
    log.mockRestore();
    error.mockRestore();
  }
  return captured;
}
