import { describe, expect, test } from "vitest";
import { formatHelp, printHelp, screenWidth, wrapText } from "./help.ts";
import { captureOutput } from "../testing/capture.ts";

// --- wrapText ---

describe("wrapText", () => {
  test("fills lines greedily", () => {
    expect(wrapText("one two three", 7)).toEqual(["one two", "three"]);
  });

  test("collapses newlines and runs of spaces", () => {
    expect(wrapText("  a\n   b  ", 10)).toEqual(["a b"]);
  });

  test("breaks words longer than the width", () => {
    expect(wrapText("abcdefghij", 4)).toEqual(["abcd", "efgh", "ij"]);
  });
});

// --- screenWidth ---

describe("screenWidth", () => {
  test("reads COLUMNS", () => {
    expect(screenWidth({ COLUMNS: "120" })).toBe(120);
  });

  test("falls back to 79", () => {
    expect(screenWidth({})).toBe(79);
    expect(screenWidth({ COLUMNS: "wide" })).toBe(79);
    expect(screenWidth({ COLUMNS: "0" })).toBe(79);
  });
});

// --- formatHelp ---

describe("formatHelp", () => {
  test("single topic", () => {
    expect(formatHelp(".url", 79)).toEqual([".url - Show the current database URL."]);
  });

  test("either alias finds a topic, and text wraps under the usage", () => {
    expect(formatHelp("?", 79)).toEqual([
      ".help or ? [<command>] - Show help for <command>. If <command> is omitted,",
      "                         show help for all commands.",
    ]);
  });

  test("unknown command", () => {
    expect(formatHelp(".nope", 79)).toBeNull();
  });

  test("all topics, aligned on the widest usage, then the epilog", () => {
    const lines = formatHelp(undefined, 79) ?? [];
    expect(lines[0]).toBe(".exit or .quit or Ctrl-D    - Quit sqlshell.");
    expect(lines).toContain("");
    expect(lines[lines.length - 1]).toBe('".indexes" or ".fk". Completion for SQL statements is not available.');
    expect(lines.every((line) => line.length <= 79)).toBe(true);
  });
});

// --- printHelp ---

describe("printHelp", () => {
  test("reports unknown commands", async () => {
    const { out, err } = await captureOutput(() => printHelp(".nope"));
    expect(out).toEqual([]);
    expect(err).toEqual(['Error: Unknown command ".nope".']);
  });

  test("prints a topic", async () => {
    const { out } = await captureOutput(() => printHelp(".schema"));
    expect(out).toEqual([".schema <table> - Show the schema for table <table>."]);
  });
});
