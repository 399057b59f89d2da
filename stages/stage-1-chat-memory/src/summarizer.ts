import { logEvent } from "../../stage-0-model-gateway/src/logger.js";
import { SummarizationError } from "./errors.js";
import { systemMessage } from "./message.js";
import { buildSummaryPrompt } from "./prompts.js";
import type { AppendOptions, Message, SummarizerDeps } from "./types.js";
import { withUsageTracking } from "./usage.js";

/**
 * Fold `newMessages` into `existingSummary` with one LLM call and return the
 * new summary as a system message. Rejects on LLM failure or an empty reply.
 */
export async function summarize(
  deps: SummarizerDeps,
  existingSummary: Message | undefined,
  newMessages: readonly Message[],
  options: AppendOptions = {}
): Promise<Message> {
  const llm = withUsageTracking(deps.llm, options.usage);
  const result = await llm.generate({
    messages: buildSummaryPrompt(existingSummary?.content, newMessages),
    temperature: options.temperature,
    maxTokens: deps.maxTokens,
    abortSignal: options.abortSignal,
  });

  const text = result.text.trim();
  if (!text) {
    throw new SummarizationError("Summarizer returned empty content.");
  }

  if (deps.logger) {
    logEvent(deps.logger, "debug", "memory", "summary.updated", {
      foldedMessages: newMessages.length,
      hadSummary: existingSummary !== undefined,
      summaryChars: text.length,
    });
  }

  return systemMessage(text);
}
