import type { CellValue, Table } from "../table/types.js";

export type CleaningAction =
  | "drop_duplicates"
  | "drop_rows"
  | "impute_median"
  | "impute_mode";

/** One audited mutation of a cleaning pass. Never edited after it is recorded. */
export interface CleaningStep {
  /** Null for table-wide actions. */
  readonly column: string | null;
  readonly action: CleaningAction;
  /** The imputed value, for imputation steps. */
  readonly parameter: CellValue;
  readonly affectedRows: number;
  readonly description: string;
}

export interface Shape {
  readonly rows: number;
  readonly columns: number;
}

export interface CleaningResult {
  readonly table: Table;
  readonly steps: readonly CleaningStep[];
  readonly before: Shape;
  readonly after: Shape;
}
