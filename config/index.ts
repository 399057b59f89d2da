import "dotenv/config";

import {
  isLogLevel,
  type LogLevel,
} from "../stages/stage-0-model-gateway/src/logger.js";
import type {
  ProviderConfig,
  ProviderName,
} from "../stages/stage-0-model-gateway/src/types.js";
import { parsePolicySpec } from "../stages/stage-1-chat-memory/src/policy.js";
import type { PolicySpec } from "../stages/stage-1-chat-memory/src/types.js";

type Env = Record<string, string | undefined>;

const PROVIDER_ORDER: readonly ProviderName[] = ["google", "deepseek"];

export interface ModelMap {
  model: string;
  endpoint: string;
  apiKey?: string;
}

export const DEFAULT_SYSTEM_PROMPT = `You are a helpful AI assistant. Be concise, friendly, and informative in your responses.
You can help answer questions, have conversations, and assist with various tasks.
When asked about the current time, provide it based on your knowledge cutoff.
You can also help with basic calculations if asked.`;

export interface MemoryConfig {
  policy: PolicySpec;
  temperature: number;
  systemPrompt: string;
}

export interface GlobalConfig {
  googleApiKey?: string;
  deepseekApiKey?: string;
  defaultModel?: string;
  logLevel: LogLevel;
  memory: MemoryConfig;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function getModelMaps(
  env: Env = process.env
): Record<ProviderName, ModelMap> {
  return {
    google: {
      model: "gemini-2.0-flash",
      endpoint: "https://generativelanguage.googleapis.com/v1beta",
      apiKey: nonEmpty(env.GOOGLE_API_KEY) ?? nonEmpty(env.GEMINI_API_KEY),
    },
    deepseek: {
      model: "deepseek-chat",
      endpoint: "https://api.deepseek.com/v1",
      apiKey: nonEmpty(env.DEEPSEEK_API_KEY),
    },
  };
}

function readTemperature(raw: string | undefined): number {
  const value = raw === undefined ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    return 0.7;
  }
  return Math.min(1, Math.max(0, value));
}

// 从 .env 读取统一配置，避免在调用处直接读取环境变量；MEMORY_POLICY 写错直接失败
export function loadGlobalConfig(env: Env = process.env): GlobalConfig {
  const logLevel = nonEmpty(env.LOG_LEVEL)?.toLowerCase();
  const windowSize = nonEmpty(env.MEMORY_WINDOW_SIZE);
  return {
    googleApiKey: nonEmpty(env.GOOGLE_API_KEY) ?? nonEmpty(env.GEMINI_API_KEY),
    deepseekApiKey: nonEmpty(env.DEEPSEEK_API_KEY),
    defaultModel: nonEmpty(env.DEFAULT_MODEL),
    logLevel: isLogLevel(logLevel) ? logLevel : "error",
    memory: {
      policy: parsePolicySpec({
        kind: nonEmpty(env.MEMORY_POLICY) ?? "sliding_window",
        windowSize: windowSize === undefined ? 6 : Number(windowSize),
      }),
      temperature: readTemperature(nonEmpty(env.TEMPERATURE)),
      systemPrompt: nonEmpty(env.SYSTEM_PROMPT) ?? DEFAULT_SYSTEM_PROMPT,
    },
  };
}

// 从 model map 构建 Provider 配置（apiKey + baseUrl），没有 key 的不注册
export function buildProviderConfig(env: Env = process.env): ProviderConfig {
  const maps = getModelMaps(env);
  const providers: ProviderConfig = {};
  if (maps.google.apiKey) {
    providers.google = {
      apiKey: maps.google.apiKey,
      baseUrl: maps.google.endpoint,
    };
  }
  if (maps.deepseek.apiKey) {
    providers.deepseek = {
      apiKey: maps.deepseek.apiKey,
      baseUrl: maps.deepseek.endpoint,
    };
  }
  return providers;
}

// model -> provider 映射（始终包含 model map 中的 model，与 apiKey 无关）
export function getModelProviderMap(
  env: Env = process.env
): Record<string, ProviderName> {
  const map: Record<string, ProviderName> = {};
  const maps = getModelMaps(env);
  for (const name of PROVIDER_ORDER) {
    map[maps[name].model] = name;
  }
  return map;
}

// fallback 模型列表：有 apiKey 的按 google -> deepseek
export function getFallbackModels(env: Env = process.env): string[] {
  const maps = getModelMaps(env);
  return PROVIDER_ORDER.filter((name) => maps[name].apiKey).map(
    (name) => maps[name].model
  );
}

// DEFAULT_MODEL 优先，否则取第一个有 apiKey 的 model
export function getDefaultModel(env: Env = process.env): string {
  const fromEnv = nonEmpty(env.DEFAULT_MODEL);
  if (fromEnv) {
    return fromEnv;
  }
  const [first] = getFallbackModels(env);
  if (first) {
    return first;
  }
  throw new Error(
    "No API key found. Set GOOGLE_API_KEY (or GEMINI_API_KEY) or DEEPSEEK_API_KEY in .env."
  );
}
