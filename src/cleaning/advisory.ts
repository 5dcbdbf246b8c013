import type { TextGenerator } from "../inference/types.js";
import type { Logger } from "../logging/logger.js";
import { columnCount, formatCell, headRows, rowCount } from "../table/table.js";
import type { Table } from "../table/types.js";

export const ADVISORY_FALLBACK =
  "AI analysis not available — performing basic cleaning only";

export const DEFAULT_SAMPLE_ROWS = 5;

/** Renders the leading rows as a fixed-width text grid with a row index. */
export function renderSample(table: Table, count: number): string {
  const rows = headRows(table, count);
  const header = ["", ...table.columns.map((c) => c.name)];
  const body = rows.map((row, i) => [String(i), ...row.map((v) => formatCell(v) || "NaN")]);
  const widths = header.map((h, col) =>
    Math.max(h.length, ...body.map((r) => (r[col] ?? "").length)),
  );
  return [header, ...body]
    .map((cells) => cells.map((cell, col) => cell.padStart(widths[col] ?? 0)).join("  "))
    .join("\n");
}

export function buildAdvisoryPrompt(
  table: Table,
  sampleRows = DEFAULT_SAMPLE_ROWS,
): string {
  const columnsInfo = table.columns.map((c) => `${c.name}: ${c.type}`).join("\n");
  return `You are a data cleaning assistant. Clean the following dataset:

Dataset Info:
${rowCount(table)} rows × ${columnCount(table)} columns
Column types:
${columnsInfo}

Sample data:
${renderSample(table, sampleRows)}

Identify and handle missing values, invalid entries, or duplicates if present.
Return only the steps you would perform and why.`;
}

export interface AdvisoryOptions {
  readonly model?: string;
  readonly sampleRows?: number;
  readonly logger?: Logger;
}

/**
 * Asks the inference host for cleaning advice. Any failure turns into the
 * fixed fallback narrative: deterministic cleaning never waits on the host.
 */
export async function composeAdvisory(
  table: Table,
  generator: TextGenerator,
  options: AdvisoryOptions = {},
): Promise<string> {
  const prompt = buildAdvisoryPrompt(table, options.sampleRows);
  try {
    const advice = await generator.query(prompt, { model: options.model });
    options.logger?.info({ chars: advice.length }, "Received cleaning advice");
    return advice;
  } catch (err) {
    options.logger?.warn({ err }, "Cleaning advice unavailable, using fallback");
    return ADVISORY_FALLBACK;
  }
}
