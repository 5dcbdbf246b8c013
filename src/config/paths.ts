import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["DATAWISE_STATE_DIR"] ?? join(homedir(), ".datawise");
}

export function getConfigPath(): string {
  return process.env["DATAWISE_CONFIG_PATH"] ?? "datawise.config.json";
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
