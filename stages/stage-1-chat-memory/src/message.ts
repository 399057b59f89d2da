import type { Message, Role } from "./types.js";

export function createMessage(role: Role, content: string): Message {
  return Object.freeze({ role, content });
}

export const userMessage = (content: string): Message =>
  createMessage("user", content);

export const assistantMessage = (content: string): Message =>
  createMessage("assistant", content);

export const systemMessage = (content: string): Message =>
  createMessage("system", content);

/** Last `count` items; a non-positive count keeps nothing (unlike `slice(-0)`). */
export function takeLast<T>(items: readonly T[], count: number): T[] {
  if (count <= 0) {
    return [];
  }
  return items.slice(-count);
}

const ROLE_LABELS: Record<Role, string> = {
  user: "User",
  assistant: "Assistant",
  system: "System",
};

/** One `Role: content` line per message, for summarization prompts. */
export function formatTranscript(messages: readonly Message[]): string {
  return messages.map((m) => `${ROLE_LABELS[m.role]}: ${m.content}`).join("\n");
}
