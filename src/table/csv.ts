import { UnreadableInputError } from "../errors/errors.js";
import { formatCell } from "./table.js";
import type { RawTable, Table } from "./types.js";

function detectDelimiter(text: string): string {
  const firstLine = text.split(/\r?\n/, 1)[0] ?? "";
  const commaCount = (firstLine.match(/,/g) ?? []).length;
  const semicolonCount = (firstLine.match(/;/g) ?? []).length;
  return semicolonCount > commaCount ? ";" : ",";
}

/** Splits CSV text into records. Quoted fields may hold delimiters, quotes and newlines. */
export function parseCsvRecords(text: string, delimiter: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === delimiter) {
      record.push(field);
      field = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && text[i + 1] === "\n") i++;
      record.push(field);
      records.push(record);
      record = [];
      field = "";
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    throw new UnreadableInputError("Unterminated quoted field in CSV input");
  }
  if (field !== "" || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  return records.filter((r) => r.some((cell) => cell.trim() !== ""));
}

export function parseCsv(text: string): RawTable {
  const sanitized = text.replace(/^\uFEFF/, "");
  const records = parseCsvRecords(sanitized, detectDelimiter(sanitized));
  const [headers = [], ...rows] = records;
  const width = headers.length;
  for (const [index, row] of rows.entries()) {
    if (row.length > width) {
      throw new UnreadableInputError(
        `CSV row ${index + 2} has ${row.length} fields, header has ${width}`,
      );
    }
  }
  return { headers, rows };
}

function quoteField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function writeCsv(table: Table): string {
  const lines: string[] = [table.columns.map((c) => quoteField(c.name)).join(",")];
  const total = table.columns[0]?.values.length ?? 0;
  for (let i = 0; i < total; i++) {
    lines.push(
      table.columns.map((c) => quoteField(formatCell(c.values[i] ?? null))).join(","),
    );
  }
  return lines.join("\n") + "\n";
}
