import type { UserMode } from "../conversation/mode.js";
import type { ConversationTurn, TurnRole } from "../conversation/types.js";

/**
 * Persistence contract for per-user mode and conversation history. Every
 * write applies fully or not at all and reports which through its result;
 * reads see earlier writes for the same user.
 */
export interface HistoryStore {
  /** Unseen users are created in the default mode. */
  getMode(userId: string): UserMode;
  setMode(userId: string, mode: UserMode): boolean;
  appendTurn(userId: string, role: TurnRole, content: string): boolean;
  /** The newest `limit` turns, oldest first. */
  getTurns(userId: string, limit: number): ConversationTurn[];
  clearTurns(userId: string): boolean;
}
