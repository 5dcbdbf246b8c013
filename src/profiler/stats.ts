import { cellKey } from "../table/table.js";
import type { CellValue } from "../table/types.js";
import type { ModeStats, NumericStats } from "./types.js";

export function numericValues(values: readonly CellValue[]): number[] {
  return values.filter((v): v is number => typeof v === "number");
}

export function median(numbers: readonly number[]): number | null {
  if (numbers.length === 0) return null;
  const sorted = [...numbers].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1
    ? sorted[mid]
    : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function numericStats(numbers: readonly number[]): NumericStats | null {
  const mid = median(numbers);
  if (mid === null) return null;

  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  for (const n of numbers) {
    if (n < min) min = n;
    if (n > max) max = n;
    sum += n;
  }
  const mean = sum / numbers.length;

  let std: number | null = null;
  if (numbers.length > 1) {
    let squares = 0;
    for (const n of numbers) squares += (n - mean) ** 2;
    std = Math.sqrt(squares / (numbers.length - 1));
  }

  return { min, max, mean, std, median: mid };
}

/** Most frequent non-null value; ties go to the value seen first. */
export function modeOf(values: readonly CellValue[]): ModeStats | null {
  // Map iteration follows insertion order, i.e. first appearance in the column
  const counts = new Map<string, { value: Exclude<CellValue, null>; count: number }>();
  for (const value of values) {
    if (value === null) continue;
    const key = cellKey(value);
    const entry = counts.get(key);
    if (entry) entry.count++;
    else counts.set(key, { value, count: 1 });
  }

  let best: ModeStats | null = null;
  for (const { value, count } of counts.values()) {
    if (best === null || count > best.frequency) {
      best = { value, frequency: count };
    }
  }
  return best;
}

export function allDistinct(values: readonly CellValue[]): boolean {
  const seen = new Set<string>();
  for (const value of values) {
    const key = cellKey(value);
    if (seen.has(key)) return false;
    seen.add(key);
  }
  return true;
}
