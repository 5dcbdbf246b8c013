import { type Bot, InputFile } from "grammy";
import type { SendDocumentParams } from "../adapter.js";

export const TELEGRAM_FILE_BASE = "https://api.telegram.org/file";

export async function sendText(
  bot: Bot,
  to: string,
  text: string,
  replyToId?: string,
  markdown = false,
): Promise<{ messageId: string }> {
  const msg = await bot.api.sendMessage(to, text, {
    reply_parameters: replyToId
      ? { message_id: Number(replyToId) }
      : undefined,
    parse_mode: markdown ? "Markdown" : undefined,
  });
  return { messageId: String(msg.message_id) };
}

export async function sendDocument(
  bot: Bot,
  params: SendDocumentParams,
): Promise<{ messageId: string }> {
  const file = new InputFile(new Uint8Array(params.data), params.filename);
  const msg = await bot.api.sendDocument(params.to, file, { caption: params.caption });
  return { messageId: String(msg.message_id) };
}

export async function sendTyping(bot: Bot, to: string): Promise<void> {
  await bot.api.sendChatAction(to, "typing");
}

export async function downloadFile(
  bot: Bot,
  token: string,
  fileId: string,
  fetchImpl: typeof fetch = fetch,
): Promise<Uint8Array> {
  const file = await bot.api.getFile(fileId);
  if (!file.file_path) {
    throw new Error(`Telegram returned no path for file ${fileId}`);
  }
  const res = await fetchImpl(`${TELEGRAM_FILE_BASE}/bot${token}/${file.file_path}`);
  if (!res.ok) {
    throw new Error(`File download failed with status ${res.status}`);
  }
  return new Uint8Array(await res.arrayBuffer());
}
