import * as XLSX from "xlsx";
import { extname } from "node:path";
import {
  EmptyInputError,
  OversizeError,
  UnreadableInputError,
} from "../errors/errors.js";
import { parseCsv } from "./csv.js";
import { buildTable } from "./infer.js";
import type { RawTable, Table } from "./types.js";

export type FileFormat = "csv" | "json" | "excel";

const FORMATS_BY_EXTENSION: Record<string, FileFormat> = {
  ".csv": "csv",
  ".json": "json",
  ".xlsx": "excel",
  ".xls": "excel",
};

/** Tried in order; the first decoding that parses wins. */
export const CSV_ENCODINGS = ["utf-8", "latin1", "windows-1252"] as const;

export interface ReadTableOptions {
  /** Hard ceiling on the raw file size, in bytes. */
  readonly maxBytes?: number;
}

export function detectFormat(filename: string): FileFormat {
  const extension = extname(filename).toLowerCase();
  const format = FORMATS_BY_EXTENSION[extension];
  if (!format) {
    throw new UnreadableInputError(
      `Unsupported file format: ${extension || "(none)"}`,
      filename,
    );
  }
  return format;
}

function decodeCsv(data: Uint8Array, filename: string): RawTable {
  let lastError: unknown;
  for (const encoding of CSV_ENCODINGS) {
    try {
      const text = new TextDecoder(encoding, { fatal: true }).decode(data);
      return parseCsv(text);
    } catch (err) {
      lastError = err;
    }
  }
  throw new UnreadableInputError(
    `Failed to read CSV with any of ${CSV_ENCODINGS.join(", ")}`,
    filename,
    { cause: lastError },
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function decodeJson(data: Uint8Array, filename: string): RawTable {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder("utf-8").decode(data));
  } catch (err) {
    throw new UnreadableInputError("Invalid JSON document", filename, { cause: err });
  }
  if (!Array.isArray(parsed) || !parsed.every(isRecord)) {
    throw new UnreadableInputError(
      "JSON input must be an array of records",
      filename,
    );
  }
  const headers: string[] = [];
  for (const record of parsed) {
    for (const key of Object.keys(record)) {
      if (!headers.includes(key)) headers.push(key);
    }
  }
  return {
    headers,
    rows: parsed.map((record) => headers.map((h) => record[h] ?? null)),
  };
}

function decodeExcel(data: Uint8Array, filename: string): RawTable {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(Buffer.from(data), { type: "buffer", cellDates: true });
  } catch (err) {
    throw new UnreadableInputError("Unable to parse the workbook", filename, {
      cause: err,
    });
  }
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) return { headers: [], rows: [] };

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    blankrows: false,
    defval: null,
  });
  const [rawHeaders = [], ...body] = rows;
  return {
    headers: rawHeaders.map((h) => (h === null || h === undefined ? "" : String(h))),
    rows: body,
  };
}

export function readTable(
  data: Uint8Array,
  filename: string,
  options: ReadTableOptions = {},
): Table {
  if (options.maxBytes !== undefined && data.byteLength > options.maxBytes) {
    throw new OversizeError("bytes", data.byteLength, options.maxBytes);
  }
  const format = detectFormat(filename);
  if (data.byteLength === 0) {
    throw new EmptyInputError(`The file ${filename} is empty`);
  }

  const raw =
    format === "csv"
      ? decodeCsv(data, filename)
      : format === "json"
        ? decodeJson(data, filename)
        : decodeExcel(data, filename);

  if (raw.headers.length === 0) {
    throw new EmptyInputError(`No columns found in ${filename}`);
  }
  return buildTable(raw);
}
