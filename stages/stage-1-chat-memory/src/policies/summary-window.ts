import { takeLast } from "../message.js";
import { summarize } from "../summarizer.js";
import type {
  AppendOptions,
  HistoryPolicy,
  Message,
  SummarizerDeps,
} from "../types.js";

/**
 * Hybrid: the last `windowSize` messages stay verbatim, everything older is
 * folded into a running summary kept at index 0 of `read()`. A deferred
 * append may leave more than `windowSize` verbatim until the next fold.
 */
export function createSummaryWindowHistory(
  deps: SummarizerDeps,
  windowSize: number
): HistoryPolicy {
  let summary: Message | undefined;
  let messages: Message[] = [];

  return {
    kind: "summary_window",

    async append(
      newMessages: readonly Message[],
      options?: AppendOptions
    ): Promise<void> {
      const verbatim = [...messages, ...newMessages];

      // boundary is ">": exactly windowSize messages is not an overflow
      if (verbatim.length <= windowSize || options?.deferSummary) {
        messages = verbatim;
        return;
      }

      const kept = takeLast(verbatim, windowSize);
      const overflow = verbatim.slice(0, verbatim.length - kept.length);
      const nextSummary = await summarize(deps, summary, overflow, options);

      summary = nextSummary;
      messages = kept;
    },

    read(): Message[] {
      return summary ? [summary, ...messages] : [...messages];
    },

    clear(): void {
      summary = undefined;
      messages = [];
    },
  };
}
