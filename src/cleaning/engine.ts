import { CleaningFailure, EmptyInputError } from "../errors/errors.js";
import type { Logger } from "../logging/logger.js";
import { median, modeOf, numericValues } from "../profiler/stats.js";
import {
  columnCount,
  countNulls,
  duplicateRowIndices,
  filterRows,
  findColumn,
  formatCell,
  isNumericType,
  replaceColumn,
  rowCount,
} from "../table/table.js";
import type { CellValue, Column, ColumnType, Table } from "../table/types.js";
import type { CleaningResult, CleaningStep } from "./types.js";

/** Columns missing less than this share of values lose the affected rows. */
export const DROP_ROWS_BELOW_RATIO = 0.1;

/** Fill value for a column with nothing to take a mode from. */
export const UNKNOWN_SENTINEL = "Unknown";

export interface CleanOptions {
  readonly logger?: Logger;
}

function removeDuplicates(table: Table, reason: string): {
  table: Table;
  step: CleaningStep | null;
} {
  const duplicates = duplicateRowIndices(table);
  if (duplicates.size === 0) return { table, step: null };
  return {
    table: filterRows(table, (i) => !duplicates.has(i)),
    step: {
      column: null,
      action: "drop_duplicates",
      parameter: null,
      affectedRows: duplicates.size,
      description: `Removed ${duplicates.size} duplicate rows${reason}`,
    },
  };
}

function fillNulls(column: Column, value: CellValue, type: ColumnType): Column {
  return {
    name: column.name,
    type,
    values: column.values.map((v) => (v === null ? value : v)),
  };
}

function imputeNumeric(
  column: Column,
  estimated: number,
): { column: Column; step: CleaningStep } | null {
  for (const value of column.values) {
    if (value !== null && typeof value !== "number") {
      throw new Error(`Numeric column holds a ${typeof value} value`);
    }
  }
  const fill = median(numericValues(column.values));
  if (fill === null) return null;

  const type: ColumnType =
    column.type === "integer" && !Number.isInteger(fill) ? "float" : column.type;
  return {
    column: fillNulls(column, fill, type),
    step: {
      column: column.name,
      action: "impute_median",
      parameter: fill,
      affectedRows: estimated,
      description: `Filled ${estimated} missing values in numeric column '${column.name}' with median (${fill})`,
    },
  };
}

function imputeMode(
  column: Column,
  estimated: number,
): { column: Column; step: CleaningStep } {
  const mode = modeOf(column.values);
  // A column without a single value keeps nothing of its type worth preserving
  const fill = mode?.value ?? UNKNOWN_SENTINEL;
  const type: ColumnType = mode ? column.type : "string";
  return {
    column: fillNulls(column, fill, type),
    step: {
      column: column.name,
      action: "impute_mode",
      parameter: fill,
      affectedRows: estimated,
      description: mode
        ? `Filled ${estimated} missing values in non-numeric column '${column.name}' with mode (${formatCell(fill)})`
        : `Filled ${estimated} missing values in empty ${column.type} column '${column.name}' with ${UNKNOWN_SENTINEL}`,
    },
  };
}

/**
 * Missing-value policy for one column, judged against the table as it is
 * now (after duplicate removal and any earlier column's row drops).
 *
 * The imputation count is an estimate: the current missing ratio applied to
 * the original row count. It can differ from the number of cells filled once
 * earlier steps have removed rows.
 */
function resolveMissing(
  table: Table,
  name: string,
  originalRows: number,
): { table: Table; step: CleaningStep | null } {
  const column = findColumn(table, name);
  if (!column) throw new Error(`Column '${name}' disappeared during cleaning`);

  const rows = rowCount(table);
  const nulls = countNulls(column.values);
  if (nulls === 0) return { table, step: null };

  if (nulls / rows < DROP_ROWS_BELOW_RATIO) {
    const kept = filterRows(table, (i) => column.values[i] !== null);
    const dropped = rows - rowCount(kept);
    return {
      table: kept,
      step: {
        column: name,
        action: "drop_rows",
        parameter: null,
        affectedRows: dropped,
        description: `Dropped ${dropped} rows with missing values in column '${name}'`,
      },
    };
  }

  const estimated = Math.trunc((nulls * originalRows) / rows);
  const imputed =
    (isNumericType(column.type) ? imputeNumeric(column, estimated) : null) ??
    imputeMode(column, estimated);
  return { table: replaceColumn(table, imputed.column), step: imputed.step };
}

/**
 * Applies the fixed cleaning policy: drop duplicate rows, then resolve
 * missing values column by column. The input table is not modified.
 *
 * Imputation can make two rows identical, so duplicates are removed once
 * more at the end; a cleaned table is therefore a fixed point of `clean`.
 *
 * @throws EmptyInputError when the table has no rows.
 * @throws CleaningFailure carrying the steps recorded before the failure.
 */
export function clean(input: Table, options: CleanOptions = {}): CleaningResult {
  const log = options.logger?.child({ component: "cleaning" });
  const originalRows = rowCount(input);
  if (originalRows === 0) {
    throw new EmptyInputError("Cannot clean a table without rows");
  }

  const steps: CleaningStep[] = [];
  const record = (step: CleaningStep | null): void => {
    if (!step) return;
    steps.push(step);
    log?.info({ column: step.column, action: step.action }, step.description);
  };

  let table = input;
  try {
    const deduped = removeDuplicates(table, "");
    table = deduped.table;
    record(deduped.step);
  } catch (err) {
    throw new CleaningFailure(null, [...steps], err);
  }

  for (const { name } of input.columns) {
    try {
      const resolved = resolveMissing(table, name, originalRows);
      table = resolved.table;
      record(resolved.step);
    } catch (err) {
      log?.error({ column: name, err }, "Cleaning aborted");
      throw new CleaningFailure(name, [...steps], err);
    }
  }

  try {
    const deduped = removeDuplicates(table, " introduced by imputation");
    table = deduped.table;
    record(deduped.step);
  } catch (err) {
    throw new CleaningFailure(null, [...steps], err);
  }

  return {
    table,
    steps,
    before: { rows: originalRows, columns: columnCount(input) },
    after: { rows: rowCount(table), columns: columnCount(table) },
  };
}
