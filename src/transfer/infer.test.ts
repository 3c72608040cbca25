import { describe, expect, test } from "vitest";
import { convertValue, inferColumnType, typeRows, valueType } from "./infer.ts";

// --- valueType ---

describe("valueType", () => {
  test("strings", () => {
    expect(valueType("42")).toBe("integer");
    expect(valueType("-3.5")).toBe("real");
    expect(valueType("1e5")).toBe("real");
    expect(valueType("TRUE")).toBe("boolean");
    expect(valueType("Ann")).toBe("text");
  });

  test("integers too big to hold exactly are text", () => {
    expect(valueType("9007199254740993")).toBe("text");
  });

  test("JSON values", () => {
    expect(valueType(7)).toBe("integer");
    expect(valueType(1.5)).toBe("real");
    expect(valueType(false)).toBe("boolean");
    expect(valueType(null)).toBeNull();
  });
});

// --- inferColumnType ---

describe("inferColumnType", () => {
  test("integers and reals widen to real", () => {
    expect(inferColumnType(["1", "2.5"])).toBe("real");
  });

  test("nulls don't count", () => {
    expect(inferColumnType([null, "true", null])).toBe("boolean");
  });

  test("a column of nulls is text", () => {
    expect(inferColumnType([null, null])).toBe("text");
  });

  test("any other mix is text", () => {
    expect(inferColumnType(["1", "x"])).toBe("text");
    expect(inferColumnType(["true", "1"])).toBe("text");
  });
});

// --- convertValue ---

describe("convertValue", () => {
  test("converts to the column type", () => {
    expect(convertValue("42", "integer")).toBe(42);
    expect(convertValue("2.5", "real")).toBe(2.5);
    expect(convertValue("TRUE", "boolean")).toBe(true);
    expect(convertValue("false", "boolean")).toBe(false);
    expect(convertValue(5, "text")).toBe("5");
    expect(convertValue(null, "integer")).toBeNull();
  });
});

// --- typeRows ---

describe("typeRows", () => {
  test("types each column and converts its cells", () => {
    expect(
      typeRows(
        ["id", "name", "score"],
        [
          ["1", "Ann", "3"],
          ["2", null, "4.5"],
        ],
      ),
    ).toEqual({
      columns: [
        { name: "id", type: "integer" },
        { name: "name", type: "text" },
        { name: "score", type: "real" },
      ],
      rows: [
        [1, "Ann", 3],
        [2, null, 4.5],
      ],
    });
  });

  test("short rows are padded with nulls", () => {
    expect(typeRows(["a", "b"], [["1"]]).rows).toEqual([[1, null]]);
  });
});
