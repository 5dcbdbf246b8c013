import type { CellValue, Column, ColumnType, Row, Table } from "./types.js";

export function createTable(columns: readonly Column[]): Table {
  const names = new Set<string>();
  const length = columns[0]?.values.length ?? 0;
  for (const column of columns) {
    if (names.has(column.name)) {
      throw new Error(`Duplicate column name: ${column.name}`);
    }
    names.add(column.name);
    if (column.values.length !== length) {
      throw new Error(
        `Column '${column.name}' has ${column.values.length} values, expected ${length}`,
      );
    }
  }
  return { columns };
}

export function rowCount(table: Table): number {
  return table.columns[0]?.values.length ?? 0;
}

export function columnCount(table: Table): number {
  return table.columns.length;
}

export function isNumericType(type: ColumnType): boolean {
  return type === "integer" || type === "float";
}

export function getRow(table: Table, index: number): Row {
  return table.columns.map((c) => c.values[index] ?? null);
}

export function headRows(table: Table, count: number): Row[] {
  const rows: Row[] = [];
  const limit = Math.min(count, rowCount(table));
  for (let i = 0; i < limit; i++) rows.push(getRow(table, i));
  return rows;
}

/** Keeps the rows whose index passes `keep`, in order. */
export function filterRows(
  table: Table,
  keep: (index: number) => boolean,
): Table {
  const indices: number[] = [];
  const total = rowCount(table);
  for (let i = 0; i < total; i++) {
    if (keep(i)) indices.push(i);
  }
  return {
    columns: table.columns.map((c) => ({
      ...c,
      values: indices.map((i) => c.values[i] ?? null),
    })),
  };
}

export function replaceColumn(table: Table, column: Column): Table {
  return {
    columns: table.columns.map((c) => (c.name === column.name ? column : c)),
  };
}

export function findColumn(table: Table, name: string): Column | undefined {
  return table.columns.find((c) => c.name === name);
}

/**
 * Equality key for a single cell. Type-tagged so that the number 1,
 * the string "1" and `true` never collide.
 */
export function cellKey(value: CellValue): string {
  if (value === null) return "n:";
  if (value instanceof Date) return `d:${value.getTime()}`;
  switch (typeof value) {
    case "number":
      return `f:${value}`;
    case "boolean":
      return `b:${value}`;
    default:
      return `s:${value}`;
  }
}

export function rowKey(row: Row): string {
  return JSON.stringify(row.map(cellKey));
}

/** Indices of rows that repeat an earlier row exactly. */
export function duplicateRowIndices(table: Table): Set<number> {
  const seen = new Set<string>();
  const duplicates = new Set<number>();
  const total = rowCount(table);
  for (let i = 0; i < total; i++) {
    const key = rowKey(getRow(table, i));
    if (seen.has(key)) duplicates.add(i);
    else seen.add(key);
  }
  return duplicates;
}

export function countNulls(values: readonly CellValue[]): number {
  let nulls = 0;
  for (const value of values) {
    if (value === null) nulls++;
  }
  return nulls;
}

export function formatCell(value: CellValue): string {
  if (value === null) return "";
  if (value instanceof Date) return value.toISOString();
  return String(value);
}
