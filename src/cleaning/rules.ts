import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import { coerceValues, inferColumnType } from "../table/infer.js";
import {
  cellKey,
  filterRows,
  findColumn,
  formatCell,
  replaceColumn,
} from "../table/table.js";
import type { CellValue, Column, Table } from "../table/types.js";

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const base = {
  column: z.string().min(1),
  description: z.string().default(""),
};

export const cleaningRuleSchema = z.discriminatedUnion("type", [
  z.object({
    ...base,
    type: z.literal("fill_missing"),
    parameters: z.object({ value: scalarSchema }),
  }),
  z.object({
    ...base,
    type: z.literal("replace_values"),
    parameters: z.object({ mapping: z.record(scalarSchema.nullable()) }),
  }),
  z.object({
    ...base,
    type: z.literal("drop_duplicates"),
    parameters: z.object({}).default({}),
  }),
  z.object({
    ...base,
    type: z.literal("convert_type"),
    parameters: z.object({ type: z.enum(["numeric", "datetime"]) }),
  }),
]);

export const ruleFileSchema = z.object({
  rules: z.array(cleaningRuleSchema),
});

export type CleaningRule = z.infer<typeof cleaningRuleSchema>;

export function parseRuleFile(raw: unknown): CleaningRule[] {
  return ruleFileSchema.parse(raw).rules;
}

export interface RuleOutcome {
  readonly table: Table;
  readonly applied: CleaningRule[];
  readonly skipped: CleaningRule[];
}

/** Re-infers the column type after its values were rewritten. */
function retyped(column: Column, values: readonly CellValue[]): Column {
  const type = inferColumnType(values);
  return { ...column, type, values: coerceValues(values, type) };
}

function applyRule(table: Table, column: Column, rule: CleaningRule): Table {
  switch (rule.type) {
    case "fill_missing": {
      const { value } = rule.parameters;
      return replaceColumn(table, retyped(column, column.values.map((v) => v ?? value)));
    }
    case "replace_values": {
      const { mapping } = rule.parameters;
      const values = column.values.map((v) => {
        const key = formatCell(v);
        return v !== null && Object.hasOwn(mapping, key) ? mapping[key] ?? null : v;
      });
      return replaceColumn(table, retyped(column, values));
    }
    case "drop_duplicates": {
      const seen = new Set<string>();
      return filterRows(table, (i) => {
        const key = cellKey(column.values[i] ?? null);
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
      });
    }
    case "convert_type": {
      if (rule.parameters.type === "datetime") {
        const values = coerceValues(column.values, "datetime");
        return replaceColumn(table, { ...column, type: "datetime", values });
      }
      const values = coerceValues(column.values, "float");
      const integral = values.every((v) => v === null || Number.isInteger(v));
      return replaceColumn(table, { ...column, type: integral ? "integer" : "float", values });
    }
  }
}

/**
 * Applies user-supplied rules in order. Rules naming a column the table does
 * not have are skipped with a warning. Unconvertible cells become missing.
 */
export function applyCleaningRules(
  table: Table,
  rules: readonly CleaningRule[],
  options: { logger?: Logger } = {},
): RuleOutcome {
  let current = table;
  const applied: CleaningRule[] = [];
  const skipped: CleaningRule[] = [];
  for (const rule of rules) {
    const column = findColumn(current, rule.column);
    if (!column) {
      options.logger?.warn({ column: rule.column, rule: rule.type }, "Column not found, skipping rule");
      skipped.push(rule);
      continue;
    }
    current = applyRule(current, column, rule);
    applied.push(rule);
  }
  return { table: current, applied, skipped };
}
