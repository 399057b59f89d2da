import { summarize } from "../summarizer.js";
import type {
  AppendOptions,
  HistoryPolicy,
  Message,
  SummarizerDeps,
} from "../types.js";

/**
 * After every append the whole history collapses into one system summary.
 * Lossy: verbatim detail degrades with each compaction. Deferred messages
 * stay verbatim after the summary until the next append folds them in.
 */
export function createRecursiveSummaryHistory(
  deps: SummarizerDeps
): HistoryPolicy {
  let summary: Message | undefined;
  // appended with deferSummary, not yet folded into the summary
  let pending: Message[] = [];

  return {
    kind: "recursive_summary",

    async append(
      newMessages: readonly Message[],
      options?: AppendOptions
    ): Promise<void> {
      if (newMessages.length === 0) {
        return;
      }
      const unfolded = [...pending, ...newMessages];
      if (options?.deferSummary) {
        pending = unfolded;
        return;
      }
      // commit only after the LLM call resolves
      summary = await summarize(deps, summary, unfolded, options);
      pending = [];
    },

    read(): Message[] {
      return summary ? [summary, ...pending] : [...pending];
    },

    clear(): void {
      summary = undefined;
      pending = [];
    },
  };
}
