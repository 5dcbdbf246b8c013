import { describe, it, expect, vi } from "vitest";
import { ApiTransport } from "../../src/inference/api-transport.js";
import { TransportError, TransportTimeout } from "../../src/errors/errors.js";
import { createSilentLogger } from "../../src/logging/logger.js";

function makeTransport(impl: typeof fetch) {
  const fetchMock = vi.fn<typeof fetch>(impl);
  const transport = new ApiTransport({
    baseUrl: "http://ollama.test:11434/",
    probeTimeoutMs: 2000,
    generateTimeoutMs: 60000,
    logger: createSilentLogger(),
    fetch: fetchMock,
  });
  return { transport, fetchMock };
}

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

describe("ApiTransport.probe", () => {
  it("checks the version endpoint", async () => {
    const { transport, fetchMock } = makeTransport(async () => json({ version: "0.1.0" }));
    expect(await transport.probe()).toBe(true);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://ollama.test:11434/api/version");
  });

  it("reports an unreachable host as down", async () => {
    const { transport } = makeTransport(async () => {
      throw new TypeError("fetch failed");
    });
    expect(await transport.probe()).toBe(false);
  });

  it("reports an error status as down and releases the body", async () => {
    const res = json({}, 503);
    const { transport } = makeTransport(async () => res);
    expect(await transport.probe()).toBe(false);
    expect(res.bodyUsed).toBe(true);
  });

  it("releases the body of a healthy version response", async () => {
    const res = json({ version: "0.1.0" });
    const { transport } = makeTransport(async () => res);
    expect(await transport.probe()).toBe(true);
    expect(res.bodyUsed).toBe(true);
  });
});

describe("ApiTransport.generate", () => {
  it("posts a non-streaming generation request", async () => {
    const { transport, fetchMock } = makeTransport(async () => json({ response: "Hello!" }));
    expect(await transport.generate("tiny-model", "Say hi")).toBe("Hello!");

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://ollama.test:11434/api/generate");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({ model: "tiny-model", prompt: "Say hi", stream: false });
  });

  it("maps an error status to a transport error", async () => {
    const res = json({ error: "no model" }, 404);
    const { transport } = makeTransport(async () => res);
    const err = await transport.generate("m", "p").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ transport: "api", reason: "http_status", status: 404 });
    expect(res.bodyUsed).toBe(true);
  });

  it("rejects a body that is not JSON", async () => {
    const { transport } = makeTransport(async () => new Response("<html>", { status: 200 }));
    await expect(transport.generate("m", "p")).rejects.toMatchObject({ reason: "malformed_response" });
  });

  it("rejects a body without a response field", async () => {
    const { transport } = makeTransport(async () => json({ done: true }));
    await expect(transport.generate("m", "p")).rejects.toMatchObject({
      reason: "malformed_response",
      message: "api transport failed (malformed_response): Missing 'response' field",
    });
  });

  it("maps an aborted request to a timeout", async () => {
    const { transport } = makeTransport(async () => {
      throw Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
    });
    const err = await transport.generate("m", "p").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportTimeout);
    expect(err).toMatchObject({ kind: "transport_timeout", timeoutMs: 60000 });
  });

  it("maps other failures to a network error", async () => {
    const { transport } = makeTransport(async () => {
      throw new TypeError("fetch failed");
    });
    await expect(transport.generate("m", "p")).rejects.toMatchObject({
      reason: "network",
      message: "api transport failed (network): fetch failed",
    });
  });
});
