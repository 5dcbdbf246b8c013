import type { OllamaConfig } from "../config/types.js";
import { ServiceUnavailable, type TransportId } from "../errors/errors.js";
import type { Logger } from "../logging/logger.js";
import { ApiTransport } from "./api-transport.js";
import { ProcessTransport } from "./process-transport.js";
import {
  INITIAL_QUERY_STATE,
  transition,
  transportFor,
  type QueryEvent,
  type QueryState,
  type RetryPolicy,
} from "./query-machine.js";
import type { QueryOptions, TextGenerator, Transport } from "./types.js";

export const TRUNCATION_MARKER = "...[truncated]";

/** Cuts `prompt` to at most `maxChars` characters, marker included. */
export function truncatePrompt(
  prompt: string,
  maxChars: number,
  marker = TRUNCATION_MARKER,
): string {
  if (prompt.length <= maxChars) return prompt;
  return prompt.slice(0, Math.max(0, maxChars - marker.length)) + marker;
}

export interface InferenceClientOptions {
  readonly api: Transport;
  readonly process: Transport;
  readonly defaultModel: string;
  readonly maxRetries: number;
  readonly retryBaseDelayMs: number;
  readonly maxPromptChars: number;
  readonly logger: Logger;
  readonly sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class InferenceClient implements TextGenerator {
  private readonly transports: Record<TransportId, Transport>;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  /**
   * Transport tried first by the next query. Switched to the process
   * transport when it answers after the API failed, so later queries skip a
   * transport known to be down. Shared by all queries on this instance and
   * written without coordination: concurrent queries race on it, last writer
   * wins. Both transports reach the same host, so the race only decides which
   * one the next query tries first.
   */
  private preferred: TransportId = "api";

  constructor(private readonly options: InferenceClientOptions) {
    this.transports = { api: options.api, process: options.process };
    this.logger = options.logger.child({ component: "inference" });
    this.sleep = options.sleep ?? defaultSleep;
  }

  getPreferredTransport(): TransportId {
    return this.preferred;
  }

  /** Forgets a sticky fallback; the next probe starts from the API again. */
  resetPreference(): void {
    this.preferred = "api";
  }

  /**
   * Probes the preferred transport, then the other one. The first to answer
   * becomes preferred.
   *
   * @throws ServiceUnavailable when neither answers.
   */
  async probe(): Promise<TransportId> {
    const order: TransportId[] =
      this.preferred === "api" ? ["api", "process"] : ["process", "api"];
    for (const id of order) {
      if (await this.transports[id].probe()) {
        if (id !== this.preferred) {
          this.logger.info({ from: this.preferred, to: id }, "Preferred transport changed by probe");
        }
        this.preferred = id;
        return id;
      }
    }
    this.logger.warn("Inference host is not running or not accessible");
    throw new ServiceUnavailable(order);
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.probe();
      return true;
    } catch (err) {
      if (err instanceof ServiceUnavailable) return false;
      throw err;
    }
  }

  async query(prompt: string, options: QueryOptions = {}): Promise<string> {
    const model = options.model ?? this.options.defaultModel;
    const policy: RetryPolicy = {
      maxRetries: options.maxRetries ?? this.options.maxRetries,
      baseDelayMs: this.options.retryBaseDelayMs,
    };
    const log = this.logger.child({ model });
    log.info({ promptChars: prompt.length }, "Querying inference host");

    let forwarded = prompt;
    let state: QueryState = INITIAL_QUERY_STATE;

    for (;;) {
      switch (state.phase) {
        case "probe": {
          let event: QueryEvent;
          try {
            event = { type: "probe_succeeded", preferred: await this.probe() };
          } catch (err) {
            event = { type: "probe_failed", error: err };
          }
          if (event.type === "probe_succeeded" && prompt.length > this.options.maxPromptChars) {
            log.warn(
              { from: prompt.length, to: this.options.maxPromptChars },
              "Truncating prompt",
            );
            forwarded = truncatePrompt(prompt, this.options.maxPromptChars);
          }
          state = transition(state, event, policy);
          break;
        }

        case "try_preferred":
        case "try_fallback": {
          const id = transportFor(state) ?? this.preferred;
          let event: QueryEvent;
          try {
            const text = await this.transports[id].generate(model, forwarded);
            event = { type: "transport_succeeded", text };
          } catch (err) {
            log.warn({ transport: id, attempt: state.attempt, err }, "Transport call failed");
            event = { type: "transport_failed", error: err };
          }
          state = transition(state, event, policy);
          break;
        }

        case "backoff":
          log.warn(
            { delayMs: state.delayMs, attempt: state.attempt, maxRetries: policy.maxRetries },
            "Retrying inference query",
          );
          await this.sleep(state.delayMs);
          state = transition(state, { type: "backoff_elapsed" }, policy);
          break;

        case "succeeded":
          if (state.answeredBy !== this.preferred) {
            log.warn({ to: state.answeredBy }, "Falling back to another transport for later queries");
            this.preferred = state.answeredBy;
          }
          return state.text;

        case "failed":
          log.error({ err: state.error }, "All inference attempts failed");
          throw state.error;
      }
    }
  }
}

export function createInferenceClient(
  config: OllamaConfig,
  defaultModel: string,
  logger: Logger,
): InferenceClient {
  return new InferenceClient({
    api: new ApiTransport({
      baseUrl: config.baseUrl,
      probeTimeoutMs: config.probeTimeoutMs,
      generateTimeoutMs: config.generateTimeoutMs,
      logger,
    }),
    process: new ProcessTransport({
      binary: config.binary,
      listTimeoutMs: config.listTimeoutMs,
      generateTimeoutMs: config.generateTimeoutMs,
      logger,
    }),
    defaultModel,
    maxRetries: config.maxRetries,
    retryBaseDelayMs: config.retryBaseDelayMs,
    maxPromptChars: config.maxPromptChars,
    logger,
  });
}
