/**
 * Chat Orchestrator: one turn through the session's memory policy and the LLM.
 * LLM failures never throw past `turn`; they become "Error: ..." replies in the transcript.
 * Only policy misuse (unknown kind, invalid window) is thrown.
 */

import {
  createSilentLogger,
  logEvent,
} from "../../stage-0-model-gateway/src/logger.js";
import {
  assistantMessage,
  systemMessage,
  userMessage,
} from "../../stage-1-chat-memory/src/message.js";
import {
  createHistoryPolicy,
  isSummarizing,
} from "../../stage-1-chat-memory/src/policy.js";
import type {
  HistoryPolicy,
  Message,
  UsageAccumulator,
} from "../../stage-1-chat-memory/src/types.js";
import {
  createUsageAccumulator,
  withUsageTracking,
  zeroUsage,
} from "../../stage-1-chat-memory/src/usage.js";
import { createKeyedMutex } from "./session-lock.js";
import { createSessionStore, formatSessionKey } from "./session-store.js";
import type {
  ChatOrchestrator,
  ChatOrchestratorDeps,
  SessionKey,
  TurnOptions,
  TurnResult,
  TurnStatus,
} from "./types.js";

export function generateSessionId(): string {
  return crypto.randomUUID().slice(0, 8);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Outbound context = persona + policy read-out, plus the user message when
 * it is not already the last entry (summarizing kinds record it after the reply).
 */
function buildContext(
  persona: Message | undefined,
  history: Message[],
  user: Message
): Message[] {
  const context = persona ? [persona, ...history] : [...history];
  if (history[history.length - 1] !== user) {
    context.push(user);
  }
  return context;
}

export function createChatOrchestrator(
  deps: ChatOrchestratorDeps
): ChatOrchestrator {
  const store = deps.store ?? createSessionStore({ logger: deps.logger });
  const logger = deps.logger ?? createSilentLogger();
  const persona = deps.systemPrompt?.trim()
    ? systemMessage(deps.systemPrompt.trim())
    : undefined;
  const mutex = createKeyedMutex();
  const summarizerDeps = {
    llm: deps.llm,
    maxTokens: deps.summaryMaxTokens,
    logger,
  };

  function policyFor(key: SessionKey): HistoryPolicy {
    return store.getOrCreate(key, () =>
      createHistoryPolicy(key.policy, summarizerDeps)
    );
  }

  function finish(
    keyId: string,
    status: TurnStatus,
    reply: string,
    usage: UsageAccumulator,
    policy: HistoryPolicy,
    error?: string
  ): TurnResult {
    const result: TurnResult = {
      status,
      reply,
      usage: usage.snapshot(),
      history: policy.read(),
      error,
    };
    logEvent(
      logger,
      status === "failed" ? "error" : "info",
      "orchestrator",
      status === "failed" ? "turn.failed" : "turn.completed",
      {
        key: keyId,
        status,
        usage: result.usage,
        historyLength: result.history.length,
        error,
      }
    );
    return result;
  }

  async function runTurn(
    text: string,
    key: SessionKey,
    keyId: string,
    options: TurnOptions
  ): Promise<TurnResult> {
    const { abortSignal, temperature } = options;
    const policy = policyFor(key);
    const usage = createUsageAccumulator();

    if (abortSignal?.aborted) {
      return finish(keyId, "cancelled", "", usage, policy);
    }

    const user = userMessage(text);
    const appendOptions = { usage, abortSignal, temperature };
    // 摘要类策略：整轮 [user, assistant] 回复后一次性提交，每轮只压缩一次
    const commitAfterReply = isSummarizing(key.policy);
    let userRecorded = false;

    try {
      if (!commitAfterReply) {
        await policy.append([user], appendOptions);
        userRecorded = true;
      }

      const context = buildContext(persona, policy.read(), user);
      const result = await withUsageTracking(deps.llm, usage).generate({
        messages: context,
        temperature,
        abortSignal,
      });

      const assistant = assistantMessage(result.text);
      await policy.append(
        userRecorded ? [assistant] : [user, assistant],
        appendOptions
      );
      return finish(keyId, "replied", result.text, usage, policy);
    } catch (error) {
      if (abortSignal?.aborted) {
        return finish(keyId, "cancelled", "", usage, policy);
      }

      const description = describeError(error);
      const reply = `Error: ${description}`;
      const missing = userRecorded
        ? [assistantMessage(reply)]
        : [user, assistantMessage(reply)];

      // no LLM call here: the failed exchange is folded on the next summarizing append
      try {
        await policy.append(missing, { deferSummary: true });
      } catch (recordError) {
        logEvent(logger, "error", "orchestrator", "turn.record_failed", {
          key: keyId,
          error: describeError(recordError),
        });
      }

      return finish(keyId, "failed", reply, usage, policy, description);
    }
  }

  return {
    async turn(
      message: string,
      key: SessionKey,
      options: TurnOptions = {}
    ): Promise<TurnResult> {
      if (!message.trim()) {
        return {
          status: "empty",
          reply: "",
          usage: zeroUsage(),
          history: store.peek(key)?.read() ?? [],
        };
      }

      const keyId = formatSessionKey(key);
      return mutex.runExclusive(keyId, () =>
        runTurn(message, key, keyId, options)
      );
    },

    clear(key: SessionKey): void {
      store.clear(key);
    },

    history(key: SessionKey): Message[] {
      return store.peek(key)?.read() ?? [];
    },

    sessions(): string[] {
      return store.keys();
    },

    newSessionId(): string {
      return (deps.generateSessionId ?? generateSessionId)();
    },
  };
}
