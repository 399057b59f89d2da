import type { HistoryPolicy, Message } from "../types.js";

/** Keeps every message; no trimming, no LLM calls. */
export function createUnboundedHistory(): HistoryPolicy {
  let messages: Message[] = [];

  return {
    kind: "unbounded",

    async append(newMessages: readonly Message[]): Promise<void> {
      messages = [...messages, ...newMessages];
    },

    read(): Message[] {
      return [...messages];
    },

    clear(): void {
      messages = [];
    },
  };
}
