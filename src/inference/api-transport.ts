import { z } from "zod";
import { TransportError, TransportTimeout } from "../errors/errors.js";
import type { Logger } from "../logging/logger.js";
import type { Transport } from "./types.js";

const generateResponseSchema = z.object({
  response: z.string(),
});

export interface ApiTransportOptions {
  readonly baseUrl: string;
  readonly probeTimeoutMs: number;
  readonly generateTimeoutMs: number;
  readonly logger: Logger;
  readonly fetch?: typeof fetch;
}

function isTimeout(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "name" in err &&
    (err.name === "TimeoutError" || err.name === "AbortError")
  );
}

function summarizeError(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  return message.length > 500 ? `${message.slice(0, 497)}...` : message;
}

/** Talks to the host's HTTP API: `GET /api/version` and `POST /api/generate`. */
export class ApiTransport implements Transport {
  readonly id = "api";
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(private readonly options: ApiTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchFn = options.fetch ?? fetch;
    this.logger = options.logger.child({ transport: "api" });
  }

  async probe(): Promise<boolean> {
    try {
      const res = await this.fetchFn(`${this.baseUrl}/api/version`, {
        signal: AbortSignal.timeout(this.options.probeTimeoutMs),
      });
      await res.body?.cancel();
      return res.ok;
    } catch (err) {
      this.logger.debug({ err: summarizeError(err) }, "API probe failed");
      return false;
    }
  }

  async generate(model: string, prompt: string): Promise<string> {
    const timeoutMs = this.options.generateTimeoutMs;
    const started = Date.now();
    let body: unknown;

    try {
      const res = await this.fetchFn(`${this.baseUrl}/api/generate`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model, prompt, stream: false }),
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!res.ok) {
        await res.body?.cancel();
        throw new TransportError("api", "http_status", `HTTP ${res.status}`, {
          status: res.status,
        });
      }
      body = await res.json();
    } catch (err) {
      if (err instanceof TransportError) throw err;
      if (isTimeout(err)) throw new TransportTimeout("api", timeoutMs);
      if (err instanceof SyntaxError) {
        throw new TransportError("api", "malformed_response", "Body is not JSON", {
          cause: err,
        });
      }
      throw new TransportError("api", "network", summarizeError(err), { cause: err });
    }

    const parsed = generateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(
        "api",
        "malformed_response",
        "Missing 'response' field",
        { cause: parsed.error },
      );
    }

    this.logger.debug(
      { model, durationMs: Date.now() - started },
      "API generation completed",
    );
    return parsed.data.response;
  }
}
