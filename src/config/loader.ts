import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { DatawiseConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function readConfigFile(configPath: string): string | null {
  try {
    return readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
}

export function parseConfigText(content: string): DatawiseConfig {
  const raw = JSON.parse(substituteEnv(content)) as unknown;
  return parseConfig(raw);
}

export function loadConfig(path?: string): DatawiseConfig {
  const configPath = resolve(path ?? getConfigPath());
  const content = readConfigFile(configPath);
  if (content === null) {
    return parseConfig({});
  }
  return parseConfigText(content);
}
