import { takeLast } from "../message.js";
import type { HistoryPolicy, Message } from "../types.js";

/** Keeps the last `windowSize` messages; oldest are dropped first. */
export function createSlidingWindowHistory(windowSize: number): HistoryPolicy {
  let messages: Message[] = [];

  return {
    kind: "sliding_window",

    async append(newMessages: readonly Message[]): Promise<void> {
      messages = takeLast([...messages, ...newMessages], windowSize);
    },

    read(): Message[] {
      return [...messages];
    },

    clear(): void {
      messages = [];
    },
  };
}
