import type { InboundMessage } from "../../src/channels/adapter.js";
import { parseConfig } from "../../src/config/schema.js";
import type { DatawiseConfig } from "../../src/config/types.js";
import { createTable } from "../../src/table/table.js";
import type { CellValue, Column, ColumnType, Table } from "../../src/table/types.js";

export function makeInboundMessage(
  overrides: Partial<InboundMessage> = {},
): InboundMessage {
  return {
    id: "msg-1",
    channelId: "mock",
    senderId: "user-1",
    senderName: "Test User",
    chatId: "chat-1",
    text: "Hello",
    timestamp: Date.now(),
    ...overrides,
  };
}

export function makeConfig(raw: Record<string, unknown> = {}): DatawiseConfig {
  return parseConfig(raw);
}

export function col(name: string, type: ColumnType, values: CellValue[]): Column {
  return { name, type, values };
}

export function makeTable(...columns: Column[]): Table {
  return createTable(columns);
}

export function encode(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/** Runs `fn` and returns what it threw; fails the test when nothing was thrown. */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
