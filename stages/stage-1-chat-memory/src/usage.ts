/**
 * Usage accounting for one logical operation: every LLM call made on its behalf
 * (main reply and summarizations) is recorded into the same accumulator.
 */

import type {
  GenerateRequest,
  LanguageModel,
} from "../../stage-0-model-gateway/src/types.js";
import type { Usage, UsageAccumulator, UsageSnapshot } from "./types.js";

export function zeroUsage(): UsageSnapshot {
  return {
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0,
    calls: 0,
    unreportedCalls: 0,
  };
}

function count(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}

export function createUsageAccumulator(): UsageAccumulator {
  let totals = zeroUsage();

  return {
    record(usage: Usage | undefined): void {
      if (!usage) {
        totals = { ...totals, unreportedCalls: totals.unreportedCalls + 1 };
        return;
      }
      totals = {
        promptTokens: totals.promptTokens + count(usage.promptTokens),
        completionTokens:
          totals.completionTokens + count(usage.completionTokens),
        totalTokens: totals.totalTokens + count(usage.totalTokens),
        calls: totals.calls + 1,
        unreportedCalls: totals.unreportedCalls,
      };
    },

    snapshot(): UsageSnapshot {
      return { ...totals };
    },

    reset(): void {
      totals = zeroUsage();
    },
  };
}

/** Wrap a LanguageModel so each completed call is recorded into `accumulator`. */
export function withUsageTracking(
  llm: LanguageModel,
  accumulator: UsageAccumulator | undefined
): LanguageModel {
  if (!accumulator) {
    return llm;
  }
  return {
    async generate(request: GenerateRequest) {
      const result = await llm.generate(request);
      accumulator.record(result.usage);
      return result;
    },
  };
}
