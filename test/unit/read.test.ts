import { describe, it, expect } from "vitest";
import * as XLSX from "xlsx";
import { detectFormat, readTable } from "../../src/table/read.js";
import {
  EmptyInputError,
  OversizeError,
  UnreadableInputError,
} from "../../src/errors/errors.js";
import { rowCount } from "../../src/table/table.js";
import { catchError, encode } from "../helpers/fixtures.js";

describe("detectFormat", () => {
  it("maps extensions case-insensitively", () => {
    expect(detectFormat("data.CSV")).toBe("csv");
    expect(detectFormat("data.json")).toBe("json");
    expect(detectFormat("book.xls")).toBe("excel");
  });

  it("rejects unsupported extensions", () => {
    expect(() => detectFormat("notes.txt")).toThrow("Unsupported file format: .txt");
    expect(() => detectFormat("README")).toThrow("Unsupported file format: (none)");
  });
});

describe("readTable", () => {
  it("reads a UTF-8 CSV file", () => {
    const table = readTable(encode("id,score\n1,2.5\n2,\n"), "a.csv");
    expect(table.columns).toEqual([
      { name: "id", type: "integer", values: [1, 2] },
      { name: "score", type: "float", values: [2.5, null] },
    ]);
  });

  it("falls back to latin1 when the bytes are not UTF-8", () => {
    const bytes = Uint8Array.from([0x63, 0x69, 0x74, 0x79, 0x0a, 0x43, 0x61, 0x66, 0xe9, 0x0a]);
    const table = readTable(bytes, "latin.csv");
    expect(table.columns[0]?.values).toEqual(["Café"]);
  });

  it("reads a JSON array of records, unioning keys in order", () => {
    const json = JSON.stringify([{ a: 1 }, { b: "x", a: 2 }]);
    const table = readTable(encode(json), "r.json");
    expect(table.columns).toEqual([
      { name: "a", type: "integer", values: [1, 2] },
      { name: "b", type: "string", values: [null, "x"] },
    ]);
  });

  it("rejects JSON that is not an array of records", () => {
    expect(() => readTable(encode('{"a":1}'), "r.json")).toThrow(
      "JSON input must be an array of records",
    );
    expect(() => readTable(encode("[1,"), "r.json")).toThrow(UnreadableInputError);
  });

  it("reads the first sheet of a workbook", () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([["id", "name"], [1, "a"], [2, null]]),
      "Sheet1",
    );
    const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
    const table = readTable(new Uint8Array(buffer), "book.xlsx");
    expect(table.columns).toEqual([
      { name: "id", type: "integer", values: [1, 2] },
      { name: "name", type: "string", values: ["a", null] },
    ]);
  });

  it("enforces the byte ceiling before parsing", () => {
    const err = catchError(() => readTable(encode("a\n1\n"), "a.txt", { maxBytes: 2 }));
    expect(err).toBeInstanceOf(OversizeError);
    expect(err).toMatchObject({ dimension: "bytes", actual: 4, limit: 2 });
  });

  it("treats an empty file as empty input", () => {
    expect(() => readTable(new Uint8Array(0), "a.csv")).toThrow(EmptyInputError);
    expect(() => readTable(encode("\n\n"), "a.csv")).toThrow(EmptyInputError);
  });

  it("keeps a header-only file as a table without rows", () => {
    const table = readTable(encode("a,b\n"), "a.csv");
    expect(rowCount(table)).toBe(0);
    expect(table.columns.map((c) => c.name)).toEqual(["a", "b"]);
  });

  it("wraps malformed CSV as unreadable input", () => {
    expect(() => readTable(encode('a\n"open\n'), "a.csv")).toThrow(UnreadableInputError);
  });
});
