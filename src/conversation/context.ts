import type { ConversationTurn } from "./types.js";

export const CONTEXT_HEADER = "Previous conversation:";
export const OMISSION_MARKER = "...[older messages omitted]...";

function renderTurn(turn: ConversationTurn): string {
  const role = turn.role === "user" ? "User" : "Assistant";
  return `${role}: ${turn.content}\n`;
}

/**
 * Renders `turns` (oldest first) under the header. When the result would
 * exceed `budgetChars`, older turns are replaced by a single omission marker
 * and only the newest turns that fit are kept, whole and in order. The newest
 * turn is always kept, so the result can exceed the budget by at most that
 * one turn.
 */
export function renderContext(
  turns: readonly ConversationTurn[],
  budgetChars: number,
): string {
  if (turns.length === 0) return "";

  const header = `${CONTEXT_HEADER}\n`;
  const lines = turns.map(renderTurn);
  const full = header + lines.join("");
  if (full.length <= budgetChars) return full;

  const prefix = `${header}${OMISSION_MARKER}\n`;
  let remaining = budgetChars - prefix.length;
  const kept: string[] = [];
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i];
    if (kept.length > 0 && line.length > remaining) break;
    kept.unshift(line);
    remaining -= line.length;
  }
  return prefix + kept.join("");
}

export function composePrompt(
  systemPrompt: string,
  context: string,
  newMessage: string,
): string {
  const exchange = `User: ${newMessage}\nAssistant:`;
  return context
    ? `${systemPrompt}\n\n${context.trimEnd()}\n\n${exchange}`
    : `${systemPrompt}\n\n${exchange}`;
}
