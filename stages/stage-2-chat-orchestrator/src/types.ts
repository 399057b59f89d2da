/**
 * Stage 2 Chat Orchestrator types.
 * One turn = user message in, assistant reply out, with the session's memory policy in between.
 */

import type {
  LanguageModel,
  Logger,
} from "../../stage-0-model-gateway/src/types.js";
import type {
  HistoryPolicy,
  Message,
  PolicySpec,
  UsageSnapshot,
} from "../../stage-1-chat-memory/src/types.js";

/** Selects one (session, technique, parameters) history. */
export interface SessionKey {
  sessionId: string;
  policy: PolicySpec;
}

/** Process-lifetime registry of live policies; entries are never evicted. */
export interface SessionStore {
  getOrCreate(key: SessionKey, factory: () => HistoryPolicy): HistoryPolicy;
  peek(key: SessionKey): HistoryPolicy | undefined;
  /** Empty the stored policy in place; no-op when absent. */
  clear(key: SessionKey): void;
  /** Canonical keys of every live history, in creation order. */
  keys(): string[];
}

export interface SessionStoreConfig {
  logger?: Logger;
}

/**
 * replied: normal reply. failed: LLM failure surfaced as "Error: ..." text.
 * empty: blank input, nothing done. cancelled: caller aborted the turn.
 */
export type TurnStatus = "replied" | "failed" | "empty" | "cancelled";

export interface TurnOptions {
  temperature?: number;
  abortSignal?: AbortSignal;
}

export interface TurnResult {
  status: TurnStatus;
  reply: string;
  /** All LLM calls made by this turn, summarization included. */
  usage: UsageSnapshot;
  /** Copy of the session's history after the turn. */
  history: Message[];
  error?: string;
}

export interface ChatOrchestratorDeps {
  llm: LanguageModel;
  store?: SessionStore;
  logger?: Logger;
  /** Persona placed first in every outbound context; never stored in history. */
  systemPrompt?: string;
  /** Cap on summary length for summarizing policies. */
  summaryMaxTokens?: number;
  generateSessionId?: () => string;
}

export interface ChatOrchestrator {
  turn(
    message: string,
    key: SessionKey,
    options?: TurnOptions
  ): Promise<TurnResult>;
  clear(key: SessionKey): void;
  history(key: SessionKey): Message[];
  /** Keys of every history created so far. */
  sessions(): string[];
  newSessionId(): string;
}
