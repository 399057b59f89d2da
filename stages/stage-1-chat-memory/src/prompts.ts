import { formatTranscript, systemMessage, userMessage } from "./message.js";
import type { Message } from "./types.js";

export const SUMMARY_INSTRUCTION =
  "Given the existing conversation summary and the new messages, " +
  "generate a new summary of the conversation. Ensure to maintain " +
  "as much relevant information as possible.";

export const NO_PREVIOUS_SUMMARY = "No previous summary";

/** Two-message prompt shared by both summarizing policies. */
export function buildSummaryPrompt(
  existingSummary: string | undefined,
  newMessages: readonly Message[]
): Message[] {
  return [
    systemMessage(SUMMARY_INSTRUCTION),
    userMessage(
      `Existing conversation summary:\n${existingSummary ?? NO_PREVIOUS_SUMMARY}\n\n` +
        `New messages:\n${formatTranscript(newMessages)}`
    ),
  ];
}
