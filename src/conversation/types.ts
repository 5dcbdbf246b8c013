export type TurnRole = "user" | "assistant";

export interface ConversationTurn {
  readonly role: TurnRole;
  readonly content: string;
  /** Epoch milliseconds. */
  readonly timestamp: number;
}
