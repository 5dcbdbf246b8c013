import type { TransportId } from "./types.js";

export type QueryState =
  | { readonly phase: "probe" }
  | {
      readonly phase: "try_preferred";
      readonly attempt: number;
      readonly preferred: TransportId;
    }
  | {
      readonly phase: "try_fallback";
      readonly attempt: number;
      readonly preferred: TransportId;
      readonly fallback: TransportId;
    }
  | {
      readonly phase: "backoff";
      readonly attempt: number;
      readonly preferred: TransportId;
      readonly delayMs: number;
      readonly lastError: unknown;
    }
  | {
      readonly phase: "succeeded";
      readonly text: string;
      readonly answeredBy: TransportId;
    }
  | { readonly phase: "failed"; readonly error: unknown };

export type QueryEvent =
  | { readonly type: "probe_succeeded"; readonly preferred: TransportId }
  | { readonly type: "probe_failed"; readonly error: unknown }
  | { readonly type: "transport_succeeded"; readonly text: string }
  | { readonly type: "transport_failed"; readonly error: unknown }
  | { readonly type: "backoff_elapsed" };

export interface RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
}

export const INITIAL_QUERY_STATE: QueryState = { phase: "probe" };

/** Only the API path has an in-line fallback; the process path is the last resort. */
export function fallbackFor(transport: TransportId): TransportId | null {
  return transport === "api" ? "process" : null;
}

/** The transport a `try_*` state calls; null in every other phase. */
export function transportFor(state: QueryState): TransportId | null {
  switch (state.phase) {
    case "try_preferred":
      return state.preferred;
    case "try_fallback":
      return state.fallback;
    default:
      return null;
  }
}

/** Linear backoff: attempt 1 waits one base delay, attempt 2 two, and so on. */
export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return attempt * baseDelayMs;
}

function afterFailedAttempt(
  attempt: number,
  preferred: TransportId,
  error: unknown,
  policy: RetryPolicy,
): QueryState {
  if (attempt > policy.maxRetries) {
    return { phase: "failed", error };
  }
  return {
    phase: "backoff",
    attempt,
    preferred,
    delayMs: backoffDelay(attempt, policy.baseDelayMs),
    lastError: error,
  };
}

/**
 * Transition table of one query:
 *
 *   probe ──ok──▶ try_preferred ──fail──▶ try_fallback ──fail──▶ backoff ──▶ try_preferred
 *     │                │ ok                    │ ok                  (or failed once
 *     ▼ fail           ▼                       ▼                      attempts run out)
 *   failed          succeeded              succeeded
 *
 * A failed preferred transport without a fallback goes straight to backoff.
 * Pure; the caller performs the probe, the calls and the sleeping.
 */
export function transition(
  state: QueryState,
  event: QueryEvent,
  policy: RetryPolicy,
): QueryState {
  switch (state.phase) {
    case "probe":
      if (event.type === "probe_succeeded") {
        return { phase: "try_preferred", attempt: 1, preferred: event.preferred };
      }
      if (event.type === "probe_failed") {
        return { phase: "failed", error: event.error };
      }
      break;

    case "try_preferred":
      if (event.type === "transport_succeeded") {
        return { phase: "succeeded", text: event.text, answeredBy: state.preferred };
      }
      if (event.type === "transport_failed") {
        const fallback = fallbackFor(state.preferred);
        return fallback
          ? { phase: "try_fallback", attempt: state.attempt, preferred: state.preferred, fallback }
          : afterFailedAttempt(state.attempt, state.preferred, event.error, policy);
      }
      break;

    case "try_fallback":
      if (event.type === "transport_succeeded") {
        return { phase: "succeeded", text: event.text, answeredBy: state.fallback };
      }
      if (event.type === "transport_failed") {
        return afterFailedAttempt(state.attempt, state.preferred, event.error, policy);
      }
      break;

    case "backoff":
      if (event.type === "backoff_elapsed") {
        return { phase: "try_preferred", attempt: state.attempt + 1, preferred: state.preferred };
      }
      break;

    case "succeeded":
    case "failed":
      break;
  }
  throw new Error(`Event '${event.type}' is not valid in phase '${state.phase}'`);
}
