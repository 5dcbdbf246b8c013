import type { CellValue, ColumnType } from "../table/types.js";

export interface NumericStats {
  readonly min: number;
  readonly max: number;
  readonly mean: number;
  /** Sample standard deviation; null with fewer than two values. */
  readonly std: number | null;
  readonly median: number;
}

export interface ModeStats {
  readonly value: Exclude<CellValue, null>;
  readonly frequency: number;
}

export interface ColumnProfile {
  readonly name: string;
  readonly type: ColumnType;
  readonly nullCount: number;
  readonly isUnique: boolean;
  /** Present for numeric columns holding at least one value. */
  readonly numeric: NumericStats | null;
  /** Present for non-numeric columns holding at least one value. */
  readonly mode: ModeStats | null;
}

export interface TableProfile {
  readonly rowCount: number;
  readonly columnCount: number;
  readonly duplicateRowCount: number;
  readonly columns: readonly ColumnProfile[];
}

export interface ProfileLimits {
  readonly maxRows: number;
  readonly maxColumns: number;
}
