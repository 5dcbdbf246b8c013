import { describe, it, expect } from "vitest";
import {
  CleaningFailure,
  EmptyInputError,
  isDatawiseError,
  OversizeError,
  ServiceUnavailable,
  TransportError,
  TransportTimeout,
  UnreadableInputError,
} from "../../src/errors/errors.js";
import { GENERIC_ERROR_MESSAGE, USER_MESSAGES, userMessageFor } from "../../src/errors/messages.js";

describe("error kinds", () => {
  it("tags each error and maps it to its user message", () => {
    const cases = [
      [new EmptyInputError("no rows"), "empty_input"],
      [new OversizeError("rows", 10, 5), "oversize"],
      [new UnreadableInputError("bad bytes", "a.csv"), "unreadable_input"],
      [new CleaningFailure("age", [], new Error("boom")), "cleaning_failure"],
      [new ServiceUnavailable(["api", "process"]), "service_unavailable"],
      [new TransportTimeout("api", 60000), "transport_timeout"],
      [new TransportError("process", "non_zero_exit", "exit 1", { exitCode: 1 }), "transport_error"],
    ] as const;

    for (const [err, kind] of cases) {
      expect(err.kind).toBe(kind);
      expect(isDatawiseError(err)).toBe(true);
      expect(userMessageFor(err)).toBe(USER_MESSAGES[kind]);
    }
  });

  it("uses the generic message for anything else", () => {
    expect(userMessageFor(new Error("Could not parse the file"))).toBe(GENERIC_ERROR_MESSAGE);
    expect(userMessageFor("oops")).toBe(GENERIC_ERROR_MESSAGE);
  });

  it("keeps structured detail on the error", () => {
    const oversize = new OversizeError("columns", 120, 100);
    expect(oversize.message).toBe("Input exceeds the columns ceiling: 120 > 100");
    expect(oversize.name).toBe("OversizeError");

    const failure = new CleaningFailure("age", [], new Error("boom"));
    expect(failure.message).toBe("Cleaning failed on column 'age': boom");
    expect(failure.column).toBe("age");

    const transport = new TransportError("api", "http_status", "HTTP 500", { status: 500 });
    expect(transport.message).toBe("api transport failed (http_status): HTTP 500");
    expect(transport.status).toBe(500);
    expect(transport.exitCode).toBeNull();
  });
});
