export { createChatOrchestrator, generateSessionId } from "./orchestrator.js";
export { createSessionStore, formatSessionKey } from "./session-store.js";
export { createKeyedMutex, type KeyedMutex } from "./session-lock.js";
export {
  MAX_DISPLAY_CHARS,
  renderHistory,
  renderOverview,
  renderUsage,
  truncateForDisplay,
} from "./render.js";
export {
  createChatRepl,
  DEFAULT_WINDOW_SIZE,
  HELP_LINES,
  runChatRepl,
  type ChatRepl,
  type ChatReplOptions,
  type ReplOutcome,
  type RunChatReplOptions,
} from "./repl.js";
export type {
  ChatOrchestrator,
  ChatOrchestratorDeps,
  SessionKey,
  SessionStore,
  SessionStoreConfig,
  TurnOptions,
  TurnResult,
  TurnStatus,
} from "./types.js";
