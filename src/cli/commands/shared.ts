import { readFileSync } from "node:fs";
import { basename } from "node:path";
import type { Writable } from "node:stream";
import type { DatawiseConfig } from "../../config/types.js";
import { userMessageFor } from "../../errors/messages.js";
import { createLogger, createSilentLogger, type Logger } from "../../logging/logger.js";

export interface InputFile {
  filename: string;
  data: Uint8Array;
}

export function readInputFile(path: string): InputFile {
  return { filename: basename(path), data: readFileSync(path) };
}

export function readJsonFile(path: string): unknown {
  return JSON.parse(readFileSync(path, "utf-8")) as unknown;
}

/** Data commands stay quiet unless asked; their results go to stdout. */
export function commandLogger(config: DatawiseConfig, verbose: boolean): Logger {
  return verbose ? createLogger({ ...config.logging, level: "debug" }) : createSilentLogger();
}

export function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Prints the user-facing message for a failure, then its detail when that differs. */
export function writeFailure(stdout: Writable, err: unknown): void {
  const friendly = userMessageFor(err);
  const detail = errorText(err);
  stdout.write(`Error: ${friendly}\n`);
  if (detail !== friendly) stdout.write(`  ${detail}\n`);
}
