import type { CleaningResult } from "./types.js";

export const NO_STEPS_MESSAGE = "No automatic cleaning steps were necessary";

export function formatCleaningReport(
  advisory: string,
  result: CleaningResult,
): string {
  const steps =
    result.steps.length > 0
      ? result.steps.map((s) => s.description).join("\n")
      : NO_STEPS_MESSAGE;
  const { before, after } = result;
  return [
    advisory.trim(),
    "",
    "ACTUAL CLEANING PERFORMED:",
    steps,
    "",
    "RESULTS:",
    `Original dataset: ${before.rows} rows × ${before.columns} columns`,
    `Cleaned dataset: ${after.rows} rows × ${after.columns} columns`,
  ].join("\n");
}
