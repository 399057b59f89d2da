import type {
  DeepSeekConfig,
  GenerateRequest,
  Generation,
  ProviderName,
} from "../types.js";
import { isRecord, optionalNumber, postJson } from "./http.js";
import { ProviderError, toUsage, type LLMProvider } from "./types.js";

type OpenAICompatibleConfig = {
  apiKey: string;
  baseUrl?: string;
  organization?: string;
};

function buildHeaders(config: OpenAICompatibleConfig): Record<string, string> {
  const headers: Record<string, string> = {
    Authorization: `Bearer ${config.apiKey}`,
  };

  if (config.organization) {
    headers["OpenAI-Organization"] = config.organization;
  }

  return headers;
}

async function callOpenAICompatible(
  providerName: ProviderName,
  request: GenerateRequest,
  config: OpenAICompatibleConfig,
  defaultBaseUrl: string
): Promise<Generation> {
  if (!request.model) {
    throw new ProviderError({
      provider: providerName,
      message: "Model is required for OpenAI-compatible providers.",
    });
  }

  if (!config.apiKey) {
    throw new ProviderError({
      provider: providerName,
      message: "API key is required for OpenAI-compatible providers.",
    });
  }

  const baseUrl = config.baseUrl ?? defaultBaseUrl;
  const payload = await postJson(
    providerName,
    `${baseUrl}/chat/completions`,
    buildHeaders(config),
    {
      model: request.model,
      messages: request.messages,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    },
    request.abortSignal
  );

  const choices = isRecord(payload) ? payload.choices : undefined;
  const choice = Array.isArray(choices) ? choices[0] : undefined;
  const message = isRecord(choice) ? choice.message : undefined;
  const content =
    isRecord(message) && typeof message.content === "string"
      ? message.content
      : undefined;

  if (content === undefined) {
    throw new ProviderError({
      provider: providerName,
      message: "Response contained no assistant message.",
    });
  }

  const usage = isRecord(payload) ? payload.usage : undefined;

  return {
    text: content,
    finishReason:
      isRecord(choice) && typeof choice.finish_reason === "string"
        ? choice.finish_reason
        : undefined,
    usage: isRecord(usage)
      ? toUsage({
          prompt: optionalNumber(usage.prompt_tokens),
          completion: optionalNumber(usage.completion_tokens),
          total: optionalNumber(usage.total_tokens),
        })
      : undefined,
    raw: payload,
  };
}

export function createOpenAICompatibleProvider(
  providerName: ProviderName,
  config: OpenAICompatibleConfig,
  defaultBaseUrl: string
): LLMProvider {
  return {
    name: providerName,
    generate(request: GenerateRequest) {
      return callOpenAICompatible(
        providerName,
        request,
        config,
        defaultBaseUrl
      );
    },
  };
}

const DEFAULT_DEEPSEEK_BASE_URL = "https://api.deepseek.com/v1";

export function createDeepSeekProvider(config: DeepSeekConfig): LLMProvider {
  return createOpenAICompatibleProvider(
    "deepseek",
    config,
    DEFAULT_DEEPSEEK_BASE_URL
  );
}
