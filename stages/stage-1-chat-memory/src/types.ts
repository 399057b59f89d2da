/**
 * Stage 1 Chat Memory types.
 * Message shape is the Stage 0 one, so a policy read-out goes straight into a generate request.
 */

import type {
  LanguageModel,
  Logger,
  Message,
  Role,
  Usage,
} from "../../stage-0-model-gateway/src/types.js";

export type { Message, Role, Usage };

export type PolicyKind =
  | "unbounded"
  | "sliding_window"
  | "recursive_summary"
  | "summary_window";

/** A memory technique plus its parameters; windowed kinds carry `windowSize`. */
export type PolicySpec =
  | { kind: "unbounded" }
  | { kind: "sliding_window"; windowSize: number }
  | { kind: "recursive_summary" }
  | { kind: "summary_window"; windowSize: number };

export type WindowedPolicySpec = Extract<PolicySpec, { windowSize: number }>;

/** Token totals for one logical operation (one turn, or one batch). */
export interface UsageSnapshot {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  /** Calls that reported usage metadata. */
  calls: number;
  /** Calls that completed without usage metadata. */
  unreportedCalls: number;
}

export interface UsageAccumulator {
  record(usage: Usage | undefined): void;
  snapshot(): UsageSnapshot;
  reset(): void;
}

export interface AppendOptions {
  /** Receives every summarization call made by this append. */
  usage?: UsageAccumulator;
  abortSignal?: AbortSignal;
  /** Temperature for summarization calls. */
  temperature?: number;
  /**
   * Store the messages verbatim without calling the LLM; summarizing
   * policies fold them in on their next summarizing append.
   */
  deferSummary?: boolean;
}

/** Retention strategy bound to one session. */
export interface HistoryPolicy {
  readonly kind: PolicyKind;
  /** Add new turns, then apply the retention rule (may call the LLM). */
  append(messages: readonly Message[], options?: AppendOptions): Promise<void>;
  /** Context to send to the LLM; a running summary, if any, comes first. */
  read(): Message[];
  clear(): void;
}

export interface SummarizerDeps {
  llm: LanguageModel;
  /** Cap on summary length, passed as maxTokens. */
  maxTokens?: number;
  logger?: Logger;
}
