import { extname } from "node:path";
import type { ChannelAdapter, InboundDocument, InboundMessage } from "../channels/adapter.js";
import type { DatasetPipeline } from "../cleaning/pipeline.js";
import type { TelegramConfig } from "../config/types.js";
import { isModeCommand } from "../conversation/mode.js";
import { CHAT_HELP, type ChatService } from "../conversation/service.js";
import { userMessageFor } from "../errors/messages.js";
import type { Logger } from "../logging/logger.js";
import { chunkText } from "../utils/text-chunker.js";

export const PROCESSING_NOTICE = "Processing your file... please wait ⏳";
export const CLEANED_FILE_CAPTION = "✅ Here's your cleaned file";
export const SUMMARY_PREFIX = "✅ Summary of cleaning:\n";

export const CHAT_MODE_NO_FILES = [
  "⚠️ You're currently in Chat Mode which doesn't support file processing.",
  "Use /datamode command to switch to Data Cleaning Mode first.",
].join("\n");

export const DATA_MODE_INSTRUCTIONS = [
  "📊 You're in Data Cleaning Mode.",
  "Please upload a data file for processing.",
  "",
  "To chat with me instead, use /chatmode command to switch to Chat Mode.",
].join("\n");

const BYTES_PER_MB = 1024 * 1024;

/** Reports whether the inference host answers; shown in the welcome text. */
export interface ServiceStatus {
  isAvailable(): Promise<boolean>;
}

export interface BotRouterDeps {
  channel: ChannelAdapter;
  chat: ChatService;
  pipeline: DatasetPipeline;
  status: ServiceStatus;
  config: TelegramConfig;
  logger: Logger;
}

/** Splits "/cmd@botname args" into its lower-cased command, or null for plain text. */
export function parseCommand(text: string): string | null {
  if (!text.startsWith("/")) return null;
  const [head = ""] = text.trim().split(/\s+/, 1);
  return head.split("@", 1)[0]?.toLowerCase() ?? null;
}

export function welcomeText(available: boolean): string {
  const status = available
    ? "✅ Ollama is running"
    : "⚠️ Ollama is not running (limited functionality)";
  return [
    "👋 Welcome to Datawise!",
    "",
    "Please select a mode:",
    "",
    "📊 *Data Cleaning* - Send data files for automated cleaning and analysis, /datamode.",
    "🤖 *Chat Mode* - Have a conversation with the AI assistant, /chatmode.",
    "",
    `Status: ${status}`,
  ].join("\n");
}

export function dataHelpText(config: TelegramConfig): string {
  return [
    "📊 *Data Cleaning Mode Help*",
    "",
    "Send me a data file and I'll clean it for you using AI.",
    "",
    `Supported formats: ${config.allowedExtensions.join(", ")}`,
    `Maximum file size: ${config.maxFileSizeMb} MB`,
    "",
    "Commands:",
    "/chatmode - Switch to chat mode",
    "/datamode - Switch to data cleaning mode",
    "/help - Show this help message",
  ].join("\n");
}

/**
 * Routes inbound messages by command and by the sender's mode. Every
 * failure ends in a reply to the user; nothing is thrown back to the channel
 * except a failure to send.
 */
export class BotRouter {
  private readonly logger: Logger;

  constructor(private readonly deps: BotRouterDeps) {
    this.logger = deps.logger.child({ component: "router" });
  }

  async handle(msg: InboundMessage): Promise<void> {
    const userId = msg.senderId;
    if (msg.document) {
      await this.handleDocument(msg, msg.document);
      return;
    }

    const text = msg.text?.trim();
    if (!text) return;

    const command = parseCommand(text);
    if (command === "/start") {
      await this.reply(msg, welcomeText(await this.deps.status.isAvailable()), true);
    } else if (command !== null && isModeCommand(command)) {
      await this.reply(msg, this.deps.chat.switchMode(userId, command), true);
    } else if (command === "/clear") {
      await this.reply(msg, this.deps.chat.clearHistory(userId));
    } else if (command === "/help") {
      const help = this.deps.chat.isChatMode(userId) ? CHAT_HELP : dataHelpText(this.deps.config);
      await this.reply(msg, help, true);
    } else if (this.deps.chat.isChatMode(userId)) {
      await this.deps.channel.sendTyping({ to: msg.chatId });
      await this.sendLong(msg.chatId, await this.deps.chat.reply(userId, text));
    } else {
      await this.reply(msg, DATA_MODE_INSTRUCTIONS);
    }
  }

  private async handleDocument(msg: InboundMessage, doc: InboundDocument): Promise<void> {
    const { config, channel, pipeline } = this.deps;
    if (this.deps.chat.isChatMode(msg.senderId)) {
      await this.reply(msg, CHAT_MODE_NO_FILES);
      return;
    }

    const extension = extname(doc.filename).toLowerCase();
    if (!config.allowedExtensions.includes(extension)) {
      await this.reply(
        msg,
        `❌ Unsupported file type. Please upload a file with one of these extensions: ${config.allowedExtensions.join(", ")}`,
      );
      return;
    }

    const sizeMb = doc.size / BYTES_PER_MB;
    if (sizeMb > config.maxFileSizeMb) {
      await this.reply(
        msg,
        `❌ File is too large (${sizeMb.toFixed(1)} MB). Maximum allowed size is ${config.maxFileSizeMb} MB.`,
      );
      return;
    }

    const log = this.logger.child({ userId: msg.senderId, filename: doc.filename });
    try {
      const data = await channel.downloadDocument(doc.fileId);
      await this.reply(msg, PROCESSING_NOTICE);
      const output = await pipeline.process({ filename: doc.filename, data });
      await channel.sendDocument({
        to: msg.chatId,
        filename: output.filename,
        data: output.csv,
        caption: CLEANED_FILE_CAPTION,
      });
      await this.sendLong(msg.chatId, SUMMARY_PREFIX + output.report);
      log.info("Document processed");
    } catch (err) {
      log.error({ err }, "Error processing document");
      await channel.sendText({ to: msg.chatId, text: `❌ Error: ${userMessageFor(err)}` });
    }
  }

  private async reply(msg: InboundMessage, text: string, markdown = false): Promise<void> {
    await this.deps.channel.sendText({ to: msg.chatId, text, replyToId: msg.id, markdown });
  }

  private async sendLong(chatId: string, text: string): Promise<void> {
    for (const chunk of chunkText(text, this.deps.channel.maxTextLength)) {
      await this.deps.channel.sendText({ to: chatId, text: chunk });
    }
  }
}
