import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

/** Fields that may carry the bot token; never written out. */
export const REDACT_PATHS = ["token", "*.token", "telegram.token", "config.telegram.token"];

const BASE_BINDINGS = { app: "datawise" };

function baseOptions(level: string): pino.LoggerOptions {
  return {
    level,
    base: BASE_BINDINGS,
    redact: { paths: REDACT_PATHS, censor: "[redacted]" },
    serializers: { err: pino.stdSerializers.err },
  };
}

export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  if (config?.file) {
    // pino refuses a transport together with an explicit destination
    return pino(baseOptions(level), pino.destination({ dest: config.file, mkdir: true, sync: true }));
  }

  if (isJson) return pino(baseOptions(level));

  return pino({
    ...baseOptions(level),
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname,app" },
    },
  });
}

/** Logger that discards everything; used by tests and quiet CLI commands. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
