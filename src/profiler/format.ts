import { formatCell } from "../table/table.js";
import type { ColumnProfile, TableProfile } from "./types.js";

function round(n: number): string {
  return String(Number(n.toFixed(4)));
}

function describeColumn(column: ColumnProfile): string {
  const parts = [`${column.name} (${column.type})`, `nulls=${column.nullCount}`];
  if (column.isUnique) parts.push("unique");
  if (column.numeric) {
    const { min, max, mean, std, median } = column.numeric;
    parts.push(
      `min=${round(min)}`,
      `max=${round(max)}`,
      `mean=${round(mean)}`,
      `std=${std === null ? "n/a" : round(std)}`,
      `median=${round(median)}`,
    );
  }
  if (column.mode) {
    parts.push(`mode=${formatCell(column.mode.value)} (x${column.mode.frequency})`);
  }
  return parts.join(", ");
}

export function formatProfile(profile: TableProfile): string {
  const lines = [
    "Dataset Summary:",
    `Shape: ${profile.rowCount} rows × ${profile.columnCount} columns`,
    profile.duplicateRowCount > 0
      ? `Found ${profile.duplicateRowCount} duplicate rows`
      : "No duplicate rows",
    "",
    "Columns:",
    ...profile.columns.map((c) => `- ${describeColumn(c)}`),
  ];
  return lines.join("\n");
}
