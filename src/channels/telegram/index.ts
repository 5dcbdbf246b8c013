import { Bot } from "grammy";
import type {
  ChannelAdapter,
  MessageHandler,
  SendDocumentParams,
  SendTextParams,
} from "../adapter.js";
import type { Logger } from "../../logging/logger.js";
import { TELEGRAM_MESSAGE_LIMIT } from "../../utils/text-chunker.js";
import { ChatQueue } from "../chat-queue.js";
import { normalizeTelegramMessage } from "./normalize.js";
import * as send from "./send.js";

export class TelegramAdapter implements ChannelAdapter {
  readonly id = "telegram";
  readonly label = "Telegram";
  readonly maxTextLength = TELEGRAM_MESSAGE_LIMIT;

  private bot: Bot | null = null;
  private botUserId: string | null = null;
  private readonly logger: Logger;
  private readonly queue: ChatQueue;

  constructor(
    private readonly token: string,
    logger: Logger,
  ) {
    this.logger = logger.child({ channel: "telegram" });
    this.queue = new ChatQueue(this.logger);
  }

  async start(handler: MessageHandler, signal: AbortSignal): Promise<void> {
    if (!this.token) throw new Error("Telegram bot token is required");

    const bot = new Bot(this.token);
    this.bot = bot;

    // grammy polls updates sequentially; handing off keeps other chats moving
    bot.on("message", (ctx) => {
      if (this.botUserId && String(ctx.from?.id) === this.botUserId) return;
      const msg = normalizeTelegramMessage(ctx);
      if (msg) this.queue.dispatch(msg.chatId, () => handler(msg));
    });

    bot.catch((err) => {
      this.logger.error({ err: err.error, updateId: err.ctx.update.update_id }, "Telegram handler failed");
    });

    signal.addEventListener("abort", () => {
      this.stop().catch((err: unknown) => {
        this.logger.error({ err }, "Failed to stop Telegram bot");
      });
    });

    const me = await bot.api.getMe();
    this.botUserId = String(me.id);
    this.logger.info({ username: me.username }, "Telegram bot connected");

    // bot.start() resolves only when polling stops
    bot.start({ drop_pending_updates: true }).catch((err: unknown) => {
      this.logger.error({ err }, "Telegram polling stopped with an error");
    });
  }

  async stop(): Promise<void> {
    const bot = this.bot;
    this.bot = null;
    if (bot) {
      await bot.stop();
      this.logger.info("Telegram bot stopped");
    }
  }

  private requireBot(): Bot {
    if (!this.bot) throw new Error("Telegram bot not started");
    return this.bot;
  }

  async sendText(params: SendTextParams): Promise<{ messageId: string }> {
    return send.sendText(this.requireBot(), params.to, params.text, params.replyToId, params.markdown);
  }

  async sendDocument(params: SendDocumentParams): Promise<{ messageId: string }> {
    return send.sendDocument(this.requireBot(), params);
  }

  async sendTyping(params: { to: string }): Promise<void> {
    await send.sendTyping(this.requireBot(), params.to);
  }

  async downloadDocument(fileId: string): Promise<Uint8Array> {
    return send.downloadFile(this.requireBot(), this.token, fileId);
  }
}
