import type { TransportId } from "../errors/errors.js";

export type { TransportId };

export interface QueryOptions {
  readonly model?: string;
  /** Retries after the first attempt; attempts = maxRetries + 1. */
  readonly maxRetries?: number;
}

/** Anything that turns a prompt into text. Implemented by `InferenceClient`. */
export interface TextGenerator {
  query(prompt: string, options?: QueryOptions): Promise<string>;
}

/** One access path to the model host. */
export interface Transport {
  readonly id: TransportId;
  /** Cheap reachability check, bounded by the short probe timeout. */
  probe(): Promise<boolean>;
  /**
   * Runs one generation. Rejects with `TransportTimeout` or `TransportError`.
   */
  generate(model: string, prompt: string): Promise<string>;
}
