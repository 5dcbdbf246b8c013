import type { ChatConfig } from "../config/types.js";
import { CHAT_APOLOGY } from "../errors/messages.js";
import type { TextGenerator } from "../inference/types.js";
import type { Logger } from "../logging/logger.js";
import type { HistoryStore } from "../store/types.js";
import { composePrompt, renderContext } from "./context.js";
import { nextMode, UserMode, type ModeCommand } from "./mode.js";

export const CHAT_MODE_ACTIVATED = [
  "🤖 *Chat Mode Activated*",
  "",
  "I'm now your personal assistant. Ask me anything!",
  "",
  "Your chat history will be saved for context.",
  "To switch back to Data Cleaning mode, use /datamode command.",
].join("\n");

export const DATA_MODE_ACTIVATED = [
  "📊 *Data Cleaning Mode Activated*",
  "",
  "Send me a data file and I'll clean it for you.",
  "",
  "To switch back to Chat mode, use /chatmode command.",
].join("\n");

export const HISTORY_CLEARED = "🧹 Your chat history has been cleared.";
export const HISTORY_CLEAR_FAILED = "⚠️ Error clearing chat history. Please try again.";

const SWITCH_FAILED: Record<UserMode, string> = {
  chat: "⚠️ Error switching to chat mode. Please try again.",
  data: "⚠️ Error switching to data cleaning mode. Please try again.",
};

const ACTIVATED: Record<UserMode, string> = {
  chat: CHAT_MODE_ACTIVATED,
  data: DATA_MODE_ACTIVATED,
};

export const CHAT_HELP = [
  "🤖 *Chat Mode Help*",
  "",
  "You can chat with me about anything! Here are some commands:",
  "",
  "/chatmode - Switch to chat mode",
  "/datamode - Switch to data cleaning mode",
  "/clear - Clear your chat history",
  "/help - Show this help message",
  "",
  "Your conversation history is saved to provide context for our discussions.",
  "Use /clear to reset it anytime.",
].join("\n");

const AVAILABILITY_PROMPT = "Hello, are you working?";

export interface ChatServiceDeps {
  store: HistoryStore;
  generator: TextGenerator;
  config: ChatConfig;
  logger: Logger;
}

/** Mode switching and context-carrying replies for chat-mode users. */
export class ChatService {
  private readonly store: HistoryStore;
  private readonly generator: TextGenerator;
  private readonly config: ChatConfig;
  private readonly logger: Logger;

  constructor(deps: ChatServiceDeps) {
    this.store = deps.store;
    this.generator = deps.generator;
    this.config = deps.config;
    this.logger = deps.logger.child({ component: "chat" });
  }

  getMode(userId: string): UserMode {
    return this.store.getMode(userId);
  }

  isChatMode(userId: string): boolean {
    return this.getMode(userId) === UserMode.Chat;
  }

  /** Applies a mode command and returns the confirmation for the user. */
  switchMode(userId: string, command: ModeCommand): string {
    const target = nextMode(this.getMode(userId), command);
    if (!this.store.setMode(userId, target)) {
      return SWITCH_FAILED[target];
    }
    this.logger.info({ userId, mode: target }, "Mode switched");
    return ACTIVATED[target];
  }

  clearHistory(userId: string): string {
    return this.store.clearTurns(userId) ? HISTORY_CLEARED : HISTORY_CLEAR_FAILED;
  }

  /**
   * Answers `text` with the user's recent turns as context. The exchange is
   * stored only when a reply was produced; any failure yields the apology
   * and leaves the history untouched.
   */
  async reply(userId: string, text: string): Promise<string> {
    const log = this.logger.child({ userId });
    try {
      const turns = this.store.getTurns(userId, this.config.historyLimit);
      const context = renderContext(turns, this.config.contextBudgetChars);
      const prompt = composePrompt(this.config.systemPrompt, context, text);

      const started = Date.now();
      const answer = await this.generator.query(prompt, { model: this.config.model });
      log.info({ durationMs: Date.now() - started }, "Generated chat response");

      if (!this.store.appendTurn(userId, "user", text) ||
          !this.store.appendTurn(userId, "assistant", answer)) {
        log.warn("Chat exchange was not fully stored");
      }
      return answer;
    } catch (err) {
      log.error({ err }, "Error processing chat message");
      return CHAT_APOLOGY;
    }
  }

  /** Sends a short test prompt with a single retry. */
  async checkModelAvailability(): Promise<boolean> {
    try {
      await this.generator.query(AVAILABILITY_PROMPT, {
        model: this.config.model,
        maxRetries: 1,
      });
      this.logger.info({ model: this.config.model }, "Chat model is available");
      return true;
    } catch (err) {
      this.logger.warn({ err, model: this.config.model }, "Chat model is not available");
      return false;
    }
  }
}
