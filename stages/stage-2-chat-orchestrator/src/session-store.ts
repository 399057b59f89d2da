import { logEvent } from "../../stage-0-model-gateway/src/logger.js";
import { isWindowed } from "../../stage-1-chat-memory/src/policy.js";
import type { HistoryPolicy } from "../../stage-1-chat-memory/src/types.js";
import type { SessionKey, SessionStore, SessionStoreConfig } from "./types.js";

/**
 * Canonical string for a key. Kinds without a window ignore window params, so
 * they are not part of the key.
 */
export function formatSessionKey(key: SessionKey): string {
  const base = `${key.sessionId}::${key.policy.kind}`;
  return isWindowed(key.policy) ? `${base}::k=${key.policy.windowSize}` : base;
}

export function createSessionStore(
  config: SessionStoreConfig = {}
): SessionStore {
  const policies = new Map<string, HistoryPolicy>();

  return {
    // 同步的查找+注册：同一 key 的并发首访只会得到一个实例
    getOrCreate(key: SessionKey, factory: () => HistoryPolicy): HistoryPolicy {
      const id = formatSessionKey(key);
      const existing = policies.get(id);
      if (existing) {
        return existing;
      }
      const created = factory();
      policies.set(id, created);
      if (config.logger) {
        logEvent(config.logger, "debug", "session", "session.created", {
          key: id,
          kind: created.kind,
        });
      }
      return created;
    },

    peek(key: SessionKey): HistoryPolicy | undefined {
      return policies.get(formatSessionKey(key));
    },

    clear(key: SessionKey): void {
      policies.get(formatSessionKey(key))?.clear();
    },

    keys(): string[] {
      return Array.from(policies.keys());
    },
  };
}
