import { describe, it, expect } from "vitest";
import { ChatQueue } from "../../src/channels/chat-queue.js";
import { createSilentLogger } from "../../src/logging/logger.js";

function gate(): { wait: Promise<void>; open: () => void } {
  let open = (): void => {};
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { wait, open };
}

describe("ChatQueue", () => {
  it("keeps serving other chats while one chat's task hangs", async () => {
    const queue = new ChatQueue(createSilentLogger());
    const seen: string[] = [];
    const slow = gate();

    queue.dispatch("chat-a", async () => {
      seen.push("start:slow");
      await slow.wait;
      seen.push("end:slow");
    });
    queue.dispatch("chat-b", async () => {
      seen.push("start:fast");
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(seen).toEqual(["start:slow", "start:fast"]);
    expect(queue.activeChats).toBe(1);

    slow.open();
    await queue.drain();
    expect(seen).toEqual(["start:slow", "start:fast", "end:slow"]);
    expect(queue.activeChats).toBe(0);
  });

  it("runs one chat's tasks in order, one at a time", async () => {
    const queue = new ChatQueue(createSilentLogger());
    const seen: string[] = [];
    const first = gate();

    queue.dispatch("chat-a", async () => {
      seen.push("start:1");
      await first.wait;
      seen.push("end:1");
    });
    queue.dispatch("chat-a", async () => {
      seen.push("start:2");
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(seen).toEqual(["start:1"]);

    first.open();
    await queue.drain();
    expect(seen).toEqual(["start:1", "end:1", "start:2"]);
  });

  it("continues a chat after a failed task", async () => {
    const queue = new ChatQueue(createSilentLogger());
    const seen: string[] = [];

    queue.dispatch("chat-a", async () => {
      throw new Error("send failed");
    });
    queue.dispatch("chat-a", async () => {
      seen.push("next");
    });

    await queue.drain();
    expect(seen).toEqual(["next"]);
  });
});
