import { describe, it, expect } from "vitest";
import {
  buildTable,
  coerceValues,
  inferColumnType,
  uniqueHeaders,
} from "../../src/table/infer.js";

describe("inferColumnType", () => {
  it("detects integers and floats", () => {
    expect(inferColumnType(["1", "2", null])).toBe("integer");
    expect(inferColumnType(["1", "2.5"])).toBe("float");
    expect(inferColumnType([3, 4.25])).toBe("float");
  });

  it("detects booleans and datetimes", () => {
    expect(inferColumnType(["true", "FALSE"])).toBe("boolean");
    expect(inferColumnType(["2024-01-01", "2024-02-03 10:00"])).toBe("datetime");
  });

  it("falls back to string for mixed or empty columns", () => {
    expect(inferColumnType(["1", "x"])).toBe("string");
    expect(inferColumnType([null, null])).toBe("string");
  });
});

describe("coerceValues", () => {
  it("maps null tokens to null and parses numbers", () => {
    expect(coerceValues(["1", "NA", "", " 3 ", "n/a"], "integer")).toEqual([1, null, null, 3, null]);
  });

  it("nulls cells that do not fit the type", () => {
    expect(coerceValues(["12", "abc"], "float")).toEqual([12, null]);
  });

  it("renders dates as ISO text for string columns", () => {
    expect(coerceValues([new Date("2024-05-06T00:00:00.000Z")], "string")).toEqual([
      "2024-05-06T00:00:00.000Z",
    ]);
  });
});

describe("uniqueHeaders", () => {
  it("names blank headers and suffixes repeats", () => {
    expect(uniqueHeaders(["a", "", "a", "a", " b "])).toEqual([
      "a",
      "Column 2",
      "a.1",
      "a.2",
      "b",
    ]);
  });
});

describe("buildTable", () => {
  it("builds typed columns from raw cells", () => {
    const table = buildTable({
      headers: ["id", "active", "city"],
      rows: [
        ["1", "true", "Oslo"],
        ["2", "false", null],
        ["3"],
      ],
    });
    expect(table.columns.map((c) => [c.name, c.type])).toEqual([
      ["id", "integer"],
      ["active", "boolean"],
      ["city", "string"],
    ]);
    expect(table.columns[1]?.values).toEqual([true, false, null]);
    expect(table.columns[2]?.values).toEqual(["Oslo", null, null]);
  });
});
