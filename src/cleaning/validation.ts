import { z } from "zod";
import {
  cellKey,
  columnCount,
  countNulls,
  findColumn,
  formatCell,
  rowCount,
} from "../table/table.js";
import type { ColumnType, Table } from "../table/types.js";
import { allDistinct, numericValues } from "../profiler/stats.js";

const columnTypeSchema = z.enum([
  "string",
  "integer",
  "float",
  "boolean",
  "datetime",
  "categorical",
]);

const allowedValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const columnSchemaSchema = z.object({
  name: z.string().min(1),
  dataType: columnTypeSchema,
  nullable: z.boolean().default(true),
  unique: z.boolean().default(false),
  minValue: z.number().optional(),
  maxValue: z.number().optional(),
  allowedValues: z.array(allowedValueSchema).optional(),
});

export const validationConfigSchema = z.object({
  columns: z.array(columnSchemaSchema).default([]),
  requiredColumns: z.array(z.string()).default([]),
  maxRows: z.number().int().positive().optional(),
  maxColumns: z.number().int().positive().optional(),
});

export type ColumnSchema = z.infer<typeof columnSchemaSchema>;
export type ValidationConfig = z.infer<typeof validationConfigSchema>;

export function parseValidationConfig(raw: unknown): ValidationConfig {
  return validationConfigSchema.parse(raw);
}

/** Declared types that the inferred type must match exactly. */
const CHECKED_TYPES: ReadonlySet<ColumnType> = new Set(["integer", "float", "boolean", "datetime"]);

/**
 * Checks `table` against `config` and lists every violation found, in
 * schema order. An empty list means the table conforms. Columns the schema
 * names but the table lacks are reported only through `requiredColumns`.
 */
export function validateTable(table: Table, config: ValidationConfig): string[] {
  const errors: string[] = [];

  const missing = config.requiredColumns.filter((name) => !findColumn(table, name));
  if (missing.length > 0) {
    errors.push(`Missing required columns: ${missing.join(", ")}`);
  }
  if (config.maxRows !== undefined && rowCount(table) > config.maxRows) {
    errors.push(`Dataset has ${rowCount(table)} rows, above maximum ${config.maxRows}`);
  }
  if (config.maxColumns !== undefined && columnCount(table) > config.maxColumns) {
    errors.push(
      `Dataset has ${columnCount(table)} columns, above maximum ${config.maxColumns}`,
    );
  }

  for (const schema of config.columns) {
    const column = findColumn(table, schema.name);
    if (!column) continue;
    const name = schema.name;

    if (CHECKED_TYPES.has(schema.dataType) && column.type !== schema.dataType) {
      errors.push(`Column ${name} should be ${schema.dataType} type`);
    }
    if (!schema.nullable && countNulls(column.values) > 0) {
      errors.push(`Column ${name} contains null values but is not nullable`);
    }
    if (schema.unique && !allDistinct(column.values)) {
      errors.push(`Column ${name} should be unique but contains duplicates`);
    }

    const numbers = numericValues(column.values);
    const { minValue, maxValue } = schema;
    if (minValue !== undefined && numbers.some((n) => n < minValue)) {
      errors.push(`Column ${name} contains values below minimum ${minValue}`);
    }
    if (maxValue !== undefined && numbers.some((n) => n > maxValue)) {
      errors.push(`Column ${name} contains values above maximum ${maxValue}`);
    }

    if (schema.allowedValues) {
      const allowed = new Set(schema.allowedValues.map(cellKey));
      const invalid = new Map<string, string>();
      for (const value of column.values) {
        if (value === null) continue;
        const key = cellKey(value);
        if (!allowed.has(key)) invalid.set(key, formatCell(value));
      }
      if (invalid.size > 0) {
        errors.push(`Column ${name} contains invalid values: ${[...invalid.values()].join(", ")}`);
      }
    }
  }

  return errors;
}
