import type { Logger } from "../logging/logger.js";

export type ChatTask = () => Promise<void>;

/**
 * Runs tasks one at a time per chat and concurrently across chats.
 * `dispatch` never waits for the task, so a slow chat cannot hold up
 * the update loop that feeds it.
 */
export class ChatQueue {
  private readonly tails = new Map<string, Promise<void>>();

  constructor(private readonly logger: Logger) {}

  dispatch(chatId: string, task: ChatTask): void {
    const previous = this.tails.get(chatId) ?? Promise.resolve();
    const next = previous.then(task).catch((err: unknown) => {
      this.logger.error({ err, chatId }, "Chat task failed");
    });
    this.tails.set(chatId, next);
    void next.then(() => {
      if (this.tails.get(chatId) === next) this.tails.delete(chatId);
    });
  }

  /** Chats with queued or running work. */
  get activeChats(): number {
    return this.tails.size;
  }

  /** Resolves once every task dispatched so far has settled. */
  async drain(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all([...this.tails.values()]);
    }
  }
}
