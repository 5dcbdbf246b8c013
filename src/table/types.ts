export type ColumnType =
  | "string"
  | "integer"
  | "float"
  | "boolean"
  | "datetime"
  | "categorical";

export type CellValue = string | number | boolean | Date | null;

export interface Column {
  readonly name: string;
  readonly type: ColumnType;
  readonly values: readonly CellValue[];
}

/**
 * Ordered, named, typed columns of equal length. Column names are unique.
 * Build through `createTable` so both invariants are checked.
 */
export interface Table {
  readonly columns: readonly Column[];
}

export type Row = readonly CellValue[];

/** Headers plus loosely typed cells, as produced by the file readers. */
export interface RawTable {
  readonly headers: string[];
  readonly rows: unknown[][];
}
