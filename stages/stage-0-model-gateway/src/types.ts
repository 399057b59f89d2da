import type { LLMProvider } from "./providers/types.js";

export type ProviderName = "google" | "deepseek";

export type Role = "system" | "user" | "assistant";

export interface Message {
  readonly role: Role;
  readonly content: string;
}

export interface GenerateRequest {
  model?: string;
  provider?: ProviderName;
  messages: readonly Message[];
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  abortSignal?: AbortSignal;
  requestId?: string;
}

/** Token counts as reported by the remote service (no local tokenizer). */
export interface Usage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface Generation {
  text: string;
  /** Absent when the provider response carried no usage metadata. */
  usage?: Usage;
  finishReason?: string;
  /**
   * 原始响应仅用于调试/审计，Gateway 不解释其中含义。
   */
  raw?: unknown;
  model?: string;
  provider?: ProviderName;
  requestId?: string;
}

/** The capability the memory layer consumes: one call in, one assistant message out. */
export interface LanguageModel {
  generate(request: GenerateRequest): Promise<Generation>;
}

export interface RetryOptions {
  maxRetries: number;
  backoffMs: number;
  maxBackoffMs?: number;
  jitter?: number;
}

export interface RequestLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  messageCount: number;
  timeoutMs?: number;
}

export interface ResponseLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  durationMs: number;
  usage?: Usage;
  finishReason?: string;
}

export interface ErrorLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  durationMs: number;
  error: {
    name: string;
    message: string;
    status?: number;
    code?: string;
  };
}

export type EventLevel = "debug" | "info" | "error";

/** Structured event from the memory and orchestration layers. */
export interface EventLog {
  timestamp: string;
  level: EventLevel;
  scope: string;
  event: string;
  details?: Record<string, unknown>;
}

export interface RequestLogger {
  logRequest(entry: RequestLog): void;
  logResponse(entry: ResponseLog): void;
  logError(entry: ErrorLog): void;
}

export interface Logger extends RequestLogger {
  logEvent(entry: EventLog): void;
}

export interface GoogleConfig {
  apiKey: string;
  baseUrl?: string;
}

export interface DeepSeekConfig {
  apiKey: string;
  baseUrl?: string;
}

export interface ProviderConfig {
  google?: GoogleConfig;
  deepseek?: DeepSeekConfig;
}

export interface GatewayConfig {
  providers: ProviderConfig;
  /** Providers registered as-is, replacing any built from `providers` under the same name. */
  customProviders?: LLMProvider[];
  defaultModel?: string;
  modelProviderMap?: Record<string, ProviderName>;
  fallbackModels?: string[];
  retry?: RetryOptions;
  timeoutMs?: number;
  logger?: RequestLogger;
}
