import { mkdirSync } from "node:fs";
import { describe, expect, test } from "vitest";
import { runScript, trimScript } from "./script.ts";
import { captureOutput } from "../testing/capture.ts";
import { FakeEngine } from "../testing/fake-engine.ts";
import { useTempDir } from "../testing/temp-dir.ts";

// --- trimScript ---

describe("trimScript", () => {
  test("drops leading and trailing blank and comment lines", () => {
    expect(trimScript(["", "-- setup", "select 1;", "", "-- done"])).toEqual({
      firstLine: 3,
      lines: ["select 1;"],
    });
  });

  test("nothing but comments", () => {
    expect(trimScript(["", "-- nothing here"])).toEqual({ firstLine: 0, lines: [] });
  });
});

// --- runScript ---

describe("runScript", () => {
  const tmp = useTempDir();

  async function run(engine: FakeEngine, path: string) {
    let ok: boolean | undefined;
    const output = await captureOutput(async () => {
      ok = await runScript(engine, path);
    });
    return { ok, ...output };
  }

  test("runs and echoes each statement", async () => {
    const engine = new FakeEngine();
    const path = tmp.write(
      "setup.sql",
      "-- schema\ncreate table t (id integer);\n\ninsert into t\n  values (1);\n",
    );
    const { ok, out, err } = await run(engine, path);
    expect(ok).toBe(true);
    expect(engine.executed).toEqual(["create table t (id integer);", "insert into t values (1);"]);
    expect(out).toEqual(["create table t (id integer);\n", "insert into t values (1);\n"]);
    expect(err).toEqual([]);
  });

  test("extension check ignores case", async () => {
    const engine = new FakeEngine();
    const path = tmp.write("SETUP.SQL", "select 1;\n");
    const { ok } = await run(engine, path);
    expect(ok).toBe(true);
    expect(engine.executed).toEqual(["select 1;"]);
  });

  test("stops at the first failure", async () => {
    const engine = new FakeEngine().fail("select bad;", "no such column: bad");
    const path = tmp.write("bad.sql", "select 1;\nselect bad;\nselect 2;\n");
    const { ok, err } = await run(engine, path);
    expect(ok).toBe(false);
    expect(engine.executed).toEqual(["select 1;", "select bad;"]);
    expect(err).toEqual(["Error: no such column: bad"]);
  });

  test("reports an incomplete final statement with its line", async () => {
    const engine = new FakeEngine();
    const path = tmp.write("partial.sql", "select 1;\n\nselect *\nfrom t\n");
    const { ok, err } = await run(engine, path);
    expect(ok).toBe(false);
    expect(engine.executed).toEqual(["select 1;"]);
    expect(err).toEqual([`Error: "${path}", line 3: File ended with an incomplete SQL statement.`]);
  });

  test("missing file", async () => {
    const path = tmp.path("missing.sql");
    const { ok, err } = await run(new FakeEngine(), path);
    expect(ok).toBe(false);
    expect(err).toEqual([`Error: File "${path}" does not exist or is not a regular file.`]);
  });

  test("directory", async () => {
    const path = tmp.path("scripts.sql");
    mkdirSync(path);
    const { err } = await run(new FakeEngine(), path);
    expect(err).toEqual([`Error: File "${path}" does not exist or is not a regular file.`]);
  });

  test("wrong extension", async () => {
    const path = tmp.write("setup.txt", "select 1;\n");
    const { ok, err } = await run(new FakeEngine(), path);
    expect(ok).toBe(false);
    expect(err).toEqual([`Error: File "${path}" does not end with ".sql".`]);
  });

  test("no statements", async () => {
    const path = tmp.write("empty.sql", "-- todo\n\n");
    const { ok, err } = await run(new FakeEngine(), path);
    expect(ok).toBe(false);
    expect(err).toEqual([`Error: "${path}" contains no SQL statements.`]);
  });
});
