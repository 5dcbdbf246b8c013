import { spawn } from "node:child_process";
import { TransportError, TransportTimeout } from "../errors/errors.js";
import type { Logger } from "../logging/logger.js";
import type { Transport } from "./types.js";

export interface ProcessTransportOptions {
  readonly binary: string;
  readonly listTimeoutMs: number;
  readonly generateTimeoutMs: number;
  readonly logger: Logger;
  readonly spawn?: typeof spawn;
}

function errorCode(err: unknown): unknown {
  return typeof err === "object" && err !== null && "code" in err
    ? err.code
    : undefined;
}

/**
 * Drives the host's CLI: `<binary> list` as the probe, and
 * `<binary> run <model>` with the prompt on stdin for generation.
 */
export class ProcessTransport implements Transport {
  readonly id = "process";
  private readonly spawnFn: typeof spawn;
  private readonly logger: Logger;

  constructor(private readonly options: ProcessTransportOptions) {
    this.spawnFn = options.spawn ?? spawn;
    this.logger = options.logger.child({ transport: "process" });
  }

  probe(): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const child = this.spawnFn(this.options.binary, ["list"], {
        stdio: "pipe",
        timeout: this.options.listTimeoutMs,
      });
      child.stdout.resume();
      child.stderr.resume();
      child.on("error", (err) => {
        this.logger.debug({ err: err.message }, "Process probe failed");
        resolve(false);
      });
      child.on("close", (code) => {
        resolve(code === 0);
      });
    });
  }

  generate(model: string, prompt: string): Promise<string> {
    const { binary, generateTimeoutMs } = this.options;
    const started = Date.now();

    return new Promise<string>((resolve, reject) => {
      const child = this.spawnFn(binary, ["run", model], { stdio: "pipe" });
      let stdout = "";
      let stderr = "";
      let timedOut = false;
      let settled = false;

      const settle = (outcome: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        outcome();
      };

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGKILL");
      }, generateTimeoutMs);

      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });
      child.stdin.on("error", (err) => {
        // The process may exit before reading its input; its exit code tells the story
        this.logger.debug({ err: err.message }, "stdin closed early");
      });

      child.on("error", (err) => {
        settle(() =>
          reject(
            errorCode(err) === "ENOENT"
              ? new TransportError(
                  "process",
                  "not_installed",
                  `'${binary}' is not installed or not in PATH`,
                  { cause: err },
                )
              : new TransportError("process", "spawn_failed", err.message, {
                  cause: err,
                }),
          ),
        );
      });

      child.on("close", (code) => {
        settle(() => {
          if (timedOut) {
            reject(new TransportTimeout("process", generateTimeoutMs));
            return;
          }
          if (code !== 0) {
            const detail = stderr.trim() || `exit code ${code}`;
            reject(
              new TransportError(
                "process",
                "non_zero_exit",
                detail.length > 500 ? `${detail.slice(0, 497)}...` : detail,
                { exitCode: code },
              ),
            );
            return;
          }
          this.logger.debug(
            { model, durationMs: Date.now() - started },
            "Process generation completed",
          );
          resolve(stdout.trim());
        });
      });

      child.stdin.end(prompt, "utf8");
    });
  }
}
