export { createModelGateway } from "./gateway.js";
export {
  createConsoleLogger,
  createSilentLogger,
  isLogLevel,
  logEvent,
  LOG_LEVELS,
  type LogLevel,
} from "./logger.js";
export { isRetryableError, withRetry } from "./retry.js";
export { ProviderError, type LLMProvider } from "./providers/types.js";
export { createGoogleProvider } from "./providers/google.js";
export {
  createDeepSeekProvider,
  createOpenAICompatibleProvider,
} from "./providers/openai.js";
export {
  createMockLanguageModel,
  MOCK_USAGE,
  type MockLanguageModel,
  type ScriptedReply,
} from "./testing/mock-llm.js";
export type {
  DeepSeekConfig,
  ErrorLog,
  EventLevel,
  EventLog,
  GatewayConfig,
  GenerateRequest,
  Generation,
  GoogleConfig,
  LanguageModel,
  Logger,
  Message,
  ProviderConfig,
  ProviderName,
  RequestLog,
  RequestLogger,
  ResponseLog,
  RetryOptions,
  Role,
  Usage,
} from "./types.js";
