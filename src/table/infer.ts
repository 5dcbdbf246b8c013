import { createTable } from "./table.js";
import type { CellValue, Column, ColumnType, RawTable, Table } from "./types.js";

const NULL_TOKENS = new Set([
  "",
  "NA",
  "N/A",
  "n/a",
  "NaN",
  "nan",
  "null",
  "NULL",
  "None",
  "#N/A",
  "<NA>",
]);

const NUMERIC_PATTERN = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;
const BOOLEAN_PATTERN = /^(?:true|false)$/i;
const DATETIME_PATTERN =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

type Scalar = string | number | boolean | Date;

function normalizeCell(value: unknown): Scalar | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "boolean") return value;
  const text = (typeof value === "string" ? value : JSON.stringify(value)).trim();
  return NULL_TOKENS.has(text) ? null : text;
}

function asNumber(value: Scalar): number | null {
  if (typeof value === "number") return value;
  if (typeof value === "string" && NUMERIC_PATTERN.test(value)) {
    return Number(value);
  }
  return null;
}

function asBoolean(value: Scalar): boolean | null {
  if (typeof value === "boolean") return value;
  if (typeof value === "string" && BOOLEAN_PATTERN.test(value)) {
    return value.toLowerCase() === "true";
  }
  return null;
}

function asDate(value: Scalar): Date | null {
  if (value instanceof Date) return value;
  if (typeof value === "string" && DATETIME_PATTERN.test(value)) {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
}

function asText(value: Scalar): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

export function inferColumnType(values: readonly (Scalar | null)[]): ColumnType {
  const present = values.filter((v): v is Scalar => v !== null);
  if (present.length === 0) return "string";

  const numbers = present.map(asNumber);
  if (numbers.every((n) => n !== null)) {
    return numbers.every((n) => Number.isInteger(n)) ? "integer" : "float";
  }
  if (present.every((v) => asBoolean(v) !== null)) return "boolean";
  if (present.every((v) => asDate(v) !== null)) return "datetime";
  return "string";
}

/** Converts normalised cells to the representation of `type`. Unconvertible cells become null. */
export function coerceValues(
  values: readonly unknown[],
  type: ColumnType,
): CellValue[] {
  return values.map((raw) => {
    const value = normalizeCell(raw);
    if (value === null) return null;
    switch (type) {
      case "integer":
      case "float":
        return asNumber(value);
      case "boolean":
        return asBoolean(value);
      case "datetime":
        return asDate(value);
      case "string":
      case "categorical":
        return asText(value);
    }
  });
}

export function uniqueHeaders(rawHeaders: readonly string[]): string[] {
  const used = new Set<string>();
  return rawHeaders.map((header, index) => {
    const base = header.trim() || `Column ${index + 1}`;
    let name = base;
    for (let n = 1; used.has(name); n++) name = `${base}.${n}`;
    used.add(name);
    return name;
  });
}

export function buildTable(raw: RawTable): Table {
  const headers = uniqueHeaders(raw.headers);
  const columns: Column[] = headers.map((name, index) => {
    const cells = raw.rows.map((row) => normalizeCell(row[index]));
    const type = inferColumnType(cells);
    return { name, type, values: coerceValues(cells, type) };
  });
  return createTable(columns);
}
