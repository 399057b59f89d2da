export {
  createHistoryPolicy,
  describePolicy,
  isSummarizing,
  isWindowed,
  parsePolicySpec,
  POLICY_KINDS,
  resolvePolicyKind,
} from "./policy.js";
export { createRecursiveSummaryHistory } from "./policies/recursive-summary.js";
export { createSlidingWindowHistory } from "./policies/sliding-window.js";
export { createSummaryWindowHistory } from "./policies/summary-window.js";
export { createUnboundedHistory } from "./policies/unbounded.js";
export {
  assistantMessage,
  createMessage,
  formatTranscript,
  systemMessage,
  takeLast,
  userMessage,
} from "./message.js";
export { buildSummaryPrompt, SUMMARY_INSTRUCTION } from "./prompts.js";
export { summarize } from "./summarizer.js";
export {
  createUsageAccumulator,
  withUsageTracking,
  zeroUsage,
} from "./usage.js";
export {
  InvalidPolicyParamsError,
  SummarizationError,
  UnknownPolicyKindError,
} from "./errors.js";
export type {
  AppendOptions,
  HistoryPolicy,
  Message,
  PolicyKind,
  PolicySpec,
  Role,
  SummarizerDeps,
  Usage,
  UsageAccumulator,
  UsageSnapshot,
  WindowedPolicySpec,
} from "./types.js";
