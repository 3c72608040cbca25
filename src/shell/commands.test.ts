import { describe, expect, test } from "vitest";
import { classify } from "./commands.ts";

describe("classify", () => {
  test("blank lines are empty", () => {
    expect(classify("")).toEqual({ kind: "empty" });
    expect(classify("   \t ")).toEqual({ kind: "empty" });
  });

  test("quit", () => {
    expect(classify(".quit")).toEqual({ kind: "quit" });
    expect(classify("  .exit  ")).toEqual({ kind: "quit" });
    expect(classify(".exit now")).toEqual({
      kind: "invalid",
      message: ".exit and .quit take no parameters.",
    });
  });

  test("help", () => {
    expect(classify(".help")).toEqual({ kind: "help" });
    expect(classify("?")).toEqual({ kind: "help" });
    expect(classify("? .tables")).toEqual({ kind: "help", topic: ".tables" });
    expect(classify(".help a b")).toEqual({
      kind: "invalid",
      message: ".help and ? take at most one parameter.",
    });
  });

  test("connect", () => {
    expect(classify(".connect sqlite://")).toEqual({ kind: "connect", spec: "sqlite://" });
    expect(classify(".connect")).toEqual({ kind: "invalid", message: "Usage: .connect <db_spec>" });
    expect(classify(".connect a b")).toEqual({ kind: "invalid", message: "Usage: .connect <db_spec>" });
  });

  test("export", () => {
    expect(classify(".export users /tmp/u.csv")).toEqual({
      kind: "export",
      table: "users",
      path: "/tmp/u.csv",
    });
    expect(classify(".export users")).toEqual({ kind: "invalid", message: "Usage: .export <table> <path>" });
  });

  test("foreign keys, indexes and schema take one table", () => {
    expect(classify(".fk orders")).toEqual({ kind: "foreign-keys", table: "orders" });
    expect(classify(".fk")).toEqual({ kind: "invalid", message: "Usage: .fk <table_name>" });
    expect(classify(".indexes orders")).toEqual({ kind: "indexes", table: "orders" });
    expect(classify(".indexes a b")).toEqual({ kind: "invalid", message: "Usage: .indexes <table_name>" });
    expect(classify(".schema orders")).toEqual({ kind: "schema", table: "orders" });
    expect(classify(".schema")).toEqual({ kind: "invalid", message: "Usage: .schema <table_name>" });
  });

  test("import with and without -n", () => {
    expect(classify(".import t data.csv")).toEqual({
      kind: "import",
      table: "t",
      path: "data.csv",
      newTableOnly: false,
    });
    expect(classify(".import -n t data.json")).toEqual({
      kind: "import",
      table: "t",
      path: "data.json",
      newTableOnly: true,
    });
  });

  test("import usage errors", () => {
    const usage = { kind: "invalid", message: "Usage: .import [-n] <table> <path>" };
    expect(classify(".import t")).toEqual(usage);
    expect(classify(".import -n data.csv")).toEqual(usage);
    expect(classify(".import -x t data.csv")).toEqual(usage);
    expect(classify(".import -n t data.csv extra")).toEqual(usage);
  });

  test("limit", () => {
    expect(classify(".limit")).toEqual({ kind: "limit" });
    expect(classify(".limit 0")).toEqual({ kind: "limit", value: 0 });
    expect(classify(".limit 25")).toEqual({ kind: "limit", value: 25 });
    expect(classify(".limit -1")).toEqual({ kind: "invalid", message: ".limit takes a non-negative integer" });
    expect(classify(".limit abc")).toEqual({ kind: "invalid", message: ".limit takes a non-negative integer" });
    expect(classify(".limit 1 2")).toEqual({ kind: "invalid", message: "Usage: .limit [<n>]" });
  });

  test("run", () => {
    expect(classify(".run ~/setup.sql")).toEqual({ kind: "run", path: "~/setup.sql" });
    expect(classify(".run")).toEqual({ kind: "invalid", message: "Usage: .run <path>" });
  });

  test("url", () => {
    expect(classify(".url")).toEqual({ kind: "url" });
    expect(classify(".url x")).toEqual({ kind: "invalid", message: ".url takes no arguments." });
  });

  test("tables without a pattern", () => {
    expect(classify(".tables")).toEqual({ kind: "tables" });
  });

  test("tables pattern is case-insensitive", () => {
    const command = classify(".tables ^user");
    if (command.kind !== "tables") throw new Error(`unexpected ${command.kind}`);
    expect(command.pattern?.source).toBe("^user");
    expect(command.pattern?.flags).toBe("i");
    expect(command.pattern?.test("USERS")).toBe(true);
  });

  test("quoted tables pattern with spaces", () => {
    const command = classify('.tables "user data"');
    if (command.kind !== "tables") throw new Error(`unexpected ${command.kind}`);
    expect(command.pattern?.source).toBe("user data");
  });

  test("tables with two patterns", () => {
    expect(classify(".tables a b")).toEqual({ kind: "invalid", message: "Too many parameters." });
  });

  test("bad tables pattern is reported, not thrown", () => {
    const command = classify(".tables [");
    if (command.kind !== "invalid") throw new Error(`unexpected ${command.kind}`);
    expect(command.message).toMatch(/^Bad regular expression: Invalid regular expression: /);
  });

  test("unclosed quote in a pattern", () => {
    expect(classify('.tables "abc')).toEqual({ kind: "invalid", message: "No closing quotation" });
  });

  test("history", () => {
    expect(classify(".history")).toEqual({ kind: "history", count: 0 });
    expect(classify(".history 10")).toEqual({ kind: "history", count: 10 });
  });

  test("history search is case-sensitive", () => {
    const command = classify(".history '^select .* from'");
    if (command.kind !== "history-search") throw new Error(`unexpected ${command.kind}`);
    expect(command.pattern.source).toBe("^select .* from");
    expect(command.pattern.flags).toBe("");
  });

  test("unknown dot-commands", () => {
    expect(classify(".dump users")).toEqual({ kind: "unknown-command", command: ".dump" });
  });

  test("commands are case-sensitive", () => {
    expect(classify(".TABLES")).toEqual({ kind: "unknown-command", command: ".TABLES" });
  });

  test("anything else is SQL, kept as typed", () => {
    expect(classify("  select * from t")).toEqual({ kind: "sql", line: "  select * from t" });
    expect(classify("-- comment")).toEqual({ kind: "sql", line: "-- comment" });
  });
});
