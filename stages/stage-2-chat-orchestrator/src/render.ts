/**
 * Plain-text panels for the terminal surface: token stats, memory overview, history.
 */

import {
  describePolicy,
  isWindowed,
} from "../../stage-1-chat-memory/src/policy.js";
import type {
  Message,
  Role,
  UsageSnapshot,
} from "../../stage-1-chat-memory/src/types.js";
import type { SessionKey } from "./types.js";

export const MAX_DISPLAY_CHARS = 300;

const ROLE_TAGS: Record<Role, string> = {
  user: "USER",
  assistant: "AI",
  system: "SYSTEM",
};

const formatCount = (n: number) => n.toLocaleString("en-US");

export function truncateForDisplay(
  content: string,
  maxChars: number = MAX_DISPLAY_CHARS
): string {
  return content.length > maxChars
    ? `${content.slice(0, maxChars)}...`
    : content;
}

export function renderUsage(usage: UsageSnapshot): string {
  const parts = [
    `Prompt tokens: ${formatCount(usage.promptTokens)}`,
    `Completion tokens: ${formatCount(usage.completionTokens)}`,
    `Total tokens: ${formatCount(usage.totalTokens)}`,
  ];
  const calls = usage.calls + usage.unreportedCalls;
  if (calls > 0) {
    parts.push(`LLM calls: ${calls}`);
  }
  return parts.join(" | ");
}

export function renderHistory(messages: readonly Message[]): string {
  if (messages.length === 0) {
    return "(no messages in history yet)";
  }
  return messages
    .map(
      (m, i) =>
        `#${i + 1} [${ROLE_TAGS[m.role]}] ${truncateForDisplay(m.content)}`
    )
    .join("\n");
}

export function renderOverview(
  key: SessionKey,
  messages: readonly Message[]
): string {
  const window = isWindowed(key.policy) ? String(key.policy.windowSize) : "N/A";
  return [
    `Type: ${describePolicy(key.policy)}`,
    `Messages: ${messages.length}`,
    `Window: ${window}`,
    `ID: ${key.sessionId}`,
  ].join(" | ");
}
