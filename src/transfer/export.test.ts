import { describe, expect, test } from "vitest";
import { exportTable, formatDate, jsonValue, toCsv, toJsonLines } from "./export.ts";
import { captureOutput } from "../testing/capture.ts";
import { FakeEngine } from "../testing/fake-engine.ts";
import { useTempDir } from "../testing/temp-dir.ts";

// --- values ---

describe("formatDate", () => {
  test("midnight UTC is a plain date", () => {
    expect(formatDate(new Date(Date.UTC(2024, 0, 2)))).toBe("2024-01-02");
  });

  test("anything else is a date-time", () => {
    expect(formatDate(new Date(Date.UTC(2024, 0, 2, 13, 30)))).toBe("2024-01-02T13:30:00.000Z");
  });
});

describe("jsonValue", () => {
  test("bigints become numbers when they fit", () => {
    expect(jsonValue(BigInt(10))).toBe(10);
    expect(jsonValue(BigInt("18446744073709551616"))).toBe("18446744073709551616");
  });

  test("binary values are base64", () => {
    expect(jsonValue(new Uint8Array([1, 2, 3]))).toBe("AQID");
  });

  test("undefined is null", () => {
    expect(jsonValue(undefined)).toBeNull();
  });
});

// --- formats ---

describe("toCsv", () => {
  test("header row, escaped values, empty nulls", () => {
    const csv = toCsv(
      ["name", "joined", "note"],
      [
        { name: "Ann, B.", joined: new Date(Date.UTC(2024, 0, 2)), note: null },
        { name: "Bob", joined: null, note: 'said "hi"' },
      ],
    );
    expect(csv).toBe('name,joined,note\n"Ann, B.",2024-01-02,\nBob,,"said ""hi"""\n');
  });

  test("no rows is just the header", () => {
    expect(toCsv(["id"], [])).toBe("id\n");
  });
});

describe("toJsonLines", () => {
  test("one object per line, in column order", () => {
    expect(toJsonLines(["id", "name"], [{ name: "Ann", id: 1 }, { id: 2 }])).toBe(
      '{"id":1,"name":"Ann"}\n{"id":2,"name":null}\n',
    );
  });
});

// --- exportTable ---

describe("exportTable", () => {
  const tmp = useTempDir();

  function engine(): FakeEngine {
    return new FakeEngine().respond("select * from users", ["id", "name"], [
      { id: 1, name: "Ann" },
      { id: 2, name: null },
    ]);
  }

  test("CSV", async () => {
    const path = tmp.path("users.csv");
    const { out, err } = await captureOutput(() => exportTable(engine(), "users", path));
    expect(out).toEqual([`Exporting users as CSV to ${path} ...`]);
    expect(err).toEqual([]);
    expect(tmp.read("users.csv")).toBe("id,name\n1,Ann\n2,\n");
  });

  test("JSON Lines", async () => {
    const path = tmp.path("users.json");
    const { out } = await captureOutput(() => exportTable(engine(), "users", path));
    expect(out).toEqual([`Exporting users as JSON (lines) to ${path} ...`]);
    expect(tmp.read("users.json")).toBe('{"id":1,"name":"Ann"}\n{"id":2,"name":null}\n');
  });

  test("unknown extension", async () => {
    const fake = engine();
    const { err } = await captureOutput(() => exportTable(fake, "users", tmp.path("users.xlsx")));
    expect(err).toEqual(['Error: Export file must end in ".csv" or ".json".']);
    expect(fake.executed).toEqual([]);
  });

  test("query failure", async () => {
    const fake = new FakeEngine().fail("select * from nope", "no such table: nope");
    let ok: boolean | undefined;
    const { err } = await captureOutput(async () => {
      ok = await exportTable(fake, "nope", tmp.path("nope.csv"));
    });
    expect(ok).toBe(false);
    expect(err).toEqual(["Error: Export failed: no such table: nope"]);
  });
});
