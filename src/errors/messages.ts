import { isDatawiseError, type ErrorKind } from "./errors.js";

export const USER_MESSAGES: Readonly<Record<ErrorKind, string>> = {
  empty_input:
    "The file appears to be empty. Please check your file and try again.",
  oversize:
    "The file is too large to process. Please upload a smaller file.",
  unreadable_input:
    "Could not parse the file. Please ensure it's properly formatted.",
  cleaning_failure:
    "Cleaning stopped partway through. No cleaned file was produced.",
  service_unavailable:
    "AI processing unavailable. The AI service (Ollama) is not responding.",
  transport_timeout:
    "The AI service took too long to answer. Please try again later.",
  transport_error:
    "The AI service returned an error. Please try again later.",
};

export const GENERIC_ERROR_MESSAGE =
  "An error occurred while processing your file.";

export const CHAT_APOLOGY =
  "⚠️ I encountered an error while processing your message. Please try again later.";

export function userMessageFor(err: unknown): string {
  return isDatawiseError(err) ? USER_MESSAGES[err.kind] : GENERIC_ERROR_MESSAGE;
}
