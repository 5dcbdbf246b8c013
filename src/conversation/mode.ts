/** Per-user behaviour: tabular cleaning, or free conversation. */
export const UserMode = {
  Data: "data",
  Chat: "chat",
} as const;

export type UserMode = (typeof UserMode)[keyof typeof UserMode];

/** Mode of any user the store has not seen before. */
export const DEFAULT_MODE: UserMode = UserMode.Data;

export type ModeCommand = "/datamode" | "/chatmode";

const TARGETS: Record<ModeCommand, UserMode> = {
  "/datamode": UserMode.Data,
  "/chatmode": UserMode.Chat,
};

export function isUserMode(value: unknown): value is UserMode {
  return value === UserMode.Data || value === UserMode.Chat;
}

export function isModeCommand(value: string): value is ModeCommand {
  return value in TARGETS;
}

/**
 * Switch commands move straight to their target, from either state.
 * There is no terminal state.
 */
export function nextMode(_current: UserMode, command: ModeCommand): UserMode {
  return TARGETS[command];
}
