import type { Context } from "grammy";
import type { InboundMessage } from "../adapter.js";

export function normalizeTelegramMessage(ctx: Context): InboundMessage | null {
  const msg = ctx.message;
  if (!msg) return null;

  const from = msg.from;
  if (!from) return null;

  const doc = msg.document;
  return {
    id: String(msg.message_id),
    channelId: "telegram",
    senderId: String(from.id),
    senderName:
      from.first_name + (from.last_name ? ` ${from.last_name}` : ""),
    chatId: String(msg.chat.id),
    text: msg.text ?? msg.caption,
    document: doc
      ? {
          fileId: doc.file_id,
          filename: doc.file_name ?? "upload",
          size: doc.file_size ?? 0,
          mimeType: doc.mime_type,
        }
      : undefined,
    timestamp: msg.date * 1000,
  };
}
