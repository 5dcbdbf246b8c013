import type { CleaningStep } from "../cleaning/types.js";

export type ErrorKind =
  | "empty_input"
  | "oversize"
  | "unreadable_input"
  | "cleaning_failure"
  | "service_unavailable"
  | "transport_timeout"
  | "transport_error";

export type TransportId = "api" | "process";

export abstract class DatawiseError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class EmptyInputError extends DatawiseError {
  readonly kind = "empty_input";
}

export type OversizeDimension = "rows" | "columns" | "bytes";

export class OversizeError extends DatawiseError {
  readonly kind = "oversize";

  constructor(
    readonly dimension: OversizeDimension,
    readonly actual: number,
    readonly limit: number,
  ) {
    super(`Input exceeds the ${dimension} ceiling: ${actual} > ${limit}`);
  }
}

export class UnreadableInputError extends DatawiseError {
  readonly kind = "unreadable_input";

  constructor(
    message: string,
    readonly filename?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class CleaningFailure extends DatawiseError {
  readonly kind = "cleaning_failure";

  constructor(
    readonly column: string | null,
    readonly steps: readonly CleaningStep[],
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      column === null
        ? `Cleaning failed: ${reason}`
        : `Cleaning failed on column '${column}': ${reason}`,
      { cause },
    );
  }
}

export class ServiceUnavailable extends DatawiseError {
  readonly kind = "service_unavailable";

  constructor(readonly probed: readonly TransportId[]) {
    super(`Inference host not reachable (probed: ${probed.join(", ")})`);
  }
}

export class TransportTimeout extends DatawiseError {
  readonly kind = "transport_timeout";

  constructor(
    readonly transport: TransportId,
    readonly timeoutMs: number,
  ) {
    super(`${transport} transport timed out after ${timeoutMs}ms`);
  }
}

export type TransportFailureReason =
  | "network"
  | "http_status"
  | "malformed_response"
  | "not_installed"
  | "spawn_failed"
  | "non_zero_exit";

export class TransportError extends DatawiseError {
  readonly kind = "transport_error";
  readonly exitCode: number | null;
  readonly status: number | null;

  constructor(
    readonly transport: TransportId,
    readonly reason: TransportFailureReason,
    detail: string,
    options?: { cause?: unknown; exitCode?: number | null; status?: number },
  ) {
    super(`${transport} transport failed (${reason}): ${detail}`, options);
    this.exitCode = options?.exitCode ?? null;
    this.status = options?.status ?? null;
  }
}

export function isDatawiseError(err: unknown): err is DatawiseError {
  return err instanceof DatawiseError;
}
