/** Longest message Telegram accepts. */
export const TELEGRAM_MESSAGE_LIMIT = 4096;

/** A boundary is used only past this share of the window. */
const MIN_SPLIT_RATIO = 0.3;

type BoundaryFinder = (window: string) => number;

const lastIndexAfter = (needle: string): BoundaryFinder => (window) => {
  const idx = window.lastIndexOf(needle);
  return idx === -1 ? -1 : idx + needle.length;
};

const sentenceEnd: BoundaryFinder = (window) => {
  let end = -1;
  for (const match of window.matchAll(/[.!?]\s+(?=[A-Z])/g)) {
    end = (match.index ?? 0) + match[0].length;
  }
  return end;
};

const BOUNDARIES: readonly BoundaryFinder[] = [
  lastIndexAfter("\n\n"),
  sentenceEnd,
  lastIndexAfter("\n"),
  lastIndexAfter(" "),
];

function splitPoint(window: string, maxLength: number): number {
  for (const find of BOUNDARIES) {
    const at = find(window);
    if (at > maxLength * MIN_SPLIT_RATIO) return at;
  }
  return maxLength;
}

/**
 * Splits `text` into pieces of at most `maxLength` characters, preferring
 * paragraph, then sentence, then line, then word boundaries. Joining the
 * pieces gives back `text`.
 */
export function chunkText(text: string, maxLength = TELEGRAM_MESSAGE_LIMIT): string[] {
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  let remaining = text;
  while (remaining.length > maxLength) {
    const at = splitPoint(remaining.slice(0, maxLength), maxLength);
    chunks.push(remaining.slice(0, at));
    remaining = remaining.slice(at);
  }
  if (remaining.length > 0) chunks.push(remaining);
  return chunks;
}
