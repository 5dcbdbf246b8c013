import { EmptyInputError, OversizeError } from "../errors/errors.js";
import {
  columnCount,
  countNulls,
  duplicateRowIndices,
  isNumericType,
  rowCount,
} from "../table/table.js";
import type { Column, Table } from "../table/types.js";
import { allDistinct, modeOf, numericStats, numericValues } from "./stats.js";
import type { ColumnProfile, ProfileLimits, TableProfile } from "./types.js";

export const DEFAULT_PROFILE_LIMITS: ProfileLimits = {
  maxRows: 1_000_000,
  maxColumns: 100,
};

/**
 * Rejects tables the rest of the pipeline must not see: empty ones, and
 * ones past the row or column ceiling. A hard stop, never a truncation.
 */
export function assertProfilable(
  table: Table,
  limits: ProfileLimits = DEFAULT_PROFILE_LIMITS,
): void {
  const rows = rowCount(table);
  const columns = columnCount(table);
  if (rows === 0) {
    throw new EmptyInputError("The table has no rows");
  }
  if (rows > limits.maxRows) {
    throw new OversizeError("rows", rows, limits.maxRows);
  }
  if (columns > limits.maxColumns) {
    throw new OversizeError("columns", columns, limits.maxColumns);
  }
}

export function profileColumn(column: Column): ColumnProfile {
  const numeric = isNumericType(column.type);
  return {
    name: column.name,
    type: column.type,
    nullCount: countNulls(column.values),
    isUnique: allDistinct(column.values),
    numeric: numeric ? numericStats(numericValues(column.values)) : null,
    mode: numeric ? null : modeOf(column.values),
  };
}

export function profile(
  table: Table,
  limits: ProfileLimits = DEFAULT_PROFILE_LIMITS,
): TableProfile {
  assertProfilable(table, limits);
  return {
    rowCount: rowCount(table),
    columnCount: columnCount(table),
    duplicateRowCount: duplicateRowIndices(table).size,
    columns: table.columns.map(profileColumn),
  };
}
