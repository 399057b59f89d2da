import { createConsoleLogger } from "./logger.js";
import { createGoogleProvider } from "./providers/google.js";
import { createDeepSeekProvider } from "./providers/openai.js";
import { ProviderError, type LLMProvider } from "./providers/types.js";
import { withRetry } from "./retry.js";
import type {
  ErrorLog,
  GatewayConfig,
  GenerateRequest,
  Generation,
  LanguageModel,
  ProviderName,
  RequestLogger,
} from "./types.js";

const DEFAULT_MODEL_PROVIDER_MAP: Record<string, ProviderName> = {
  "gemini-2.5-flash": "google",
  "gemini-2.0-flash": "google",
  "gemini-1.5-flash": "google",
  "deepseek-chat": "deepseek",
  "deepseek-reasoner": "deepseek",
};

function resolveTimeout(
  request: GenerateRequest,
  config: GatewayConfig
): number | undefined {
  const requestTimeout = request.timeoutMs ?? Number.POSITIVE_INFINITY;
  const configTimeout = config.timeoutMs ?? Number.POSITIVE_INFINITY;
  const min = Math.min(requestTimeout, configTimeout);
  return Number.isFinite(min) ? min : undefined;
}

/** One signal that fires on caller abort or on timeout, whichever comes first. */
function createMergedSignal(
  abortSignal: AbortSignal | undefined,
  timeoutMs: number | undefined
): { signal?: AbortSignal; cancel: () => void } {
  if (!abortSignal && !timeoutMs) {
    return { cancel: () => {} };
  }

  const controller = new AbortController();
  const timeoutId = timeoutMs
    ? setTimeout(() => controller.abort(), timeoutMs)
    : undefined;
  const onAbort = () => controller.abort();

  if (abortSignal?.aborted) {
    controller.abort();
  } else {
    abortSignal?.addEventListener("abort", onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    cancel: () => {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      abortSignal?.removeEventListener("abort", onAbort);
    },
  };
}

function buildProviderRegistry(
  config: GatewayConfig
): Map<ProviderName, LLMProvider> {
  const registry = new Map<ProviderName, LLMProvider>();

  if (config.providers.google) {
    registry.set("google", createGoogleProvider(config.providers.google));
  }
  if (config.providers.deepseek) {
    registry.set("deepseek", createDeepSeekProvider(config.providers.deepseek));
  }
  for (const provider of config.customProviders ?? []) {
    registry.set(provider.name, provider);
  }

  return registry;
}

function resolveProviderName(
  model: string,
  explicitProvider: ProviderName | undefined,
  modelProviderMap: Record<string, ProviderName>
): ProviderName {
  if (explicitProvider) {
    return explicitProvider;
  }

  const provider = modelProviderMap[model];
  if (!provider) {
    throw new Error(`No provider mapping found for model: ${model}`);
  }

  return provider;
}

function ensureProvider(
  registry: Map<ProviderName, LLMProvider>,
  providerName: ProviderName
): LLMProvider {
  const provider = registry.get(providerName);
  if (!provider) {
    throw new Error(`Provider not configured: ${providerName}`);
  }
  return provider;
}

function describeError(error: unknown): ErrorLog["error"] {
  if (error instanceof ProviderError) {
    return {
      name: error.name,
      message: error.message,
      status: error.status,
      code: error.code,
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: "Error", message: String(error) };
}

function createLogger(config: GatewayConfig): RequestLogger {
  return config.logger ?? createConsoleLogger("info");
}

/**
 * Model gateway: picks provider by model, applies timeout + retry, walks the
 * fallback list, and logs every attempt. Implements the LanguageModel capability.
 */
export function createModelGateway(config: GatewayConfig): LanguageModel {
  const modelProviderMap = {
    ...DEFAULT_MODEL_PROVIDER_MAP,
    ...(config.modelProviderMap ?? {}),
  };
  const registry = buildProviderRegistry(config);
  const logger = createLogger(config);

  async function generate(request: GenerateRequest): Promise<Generation> {
    const model = request.model ?? config.defaultModel;
    if (!model) {
      throw new Error(
        "Model is required. Provide request.model or config.defaultModel."
      );
    }

    const modelsToTry = [
      model,
      ...(config.fallbackModels ?? []).filter((m) => m !== model),
    ];
    const timeoutMs = resolveTimeout(request, config);
    const requestId = request.requestId ?? crypto.randomUUID();

    let lastError: unknown;

    for (const candidate of modelsToTry) {
      const providerName = resolveProviderName(
        candidate,
        request.provider,
        modelProviderMap
      );
      const provider = ensureProvider(registry, providerName);
      const attemptStart = Date.now();

      logger.logRequest({
        timestamp: new Date().toISOString(),
        requestId,
        model: candidate,
        provider: providerName,
        messageCount: request.messages.length,
        timeoutMs,
      });

      const attempt = async () => {
        const { signal, cancel } = createMergedSignal(
          request.abortSignal,
          timeoutMs
        );
        try {
          return await provider.generate({
            ...request,
            model: candidate,
            provider: providerName,
            requestId,
            abortSignal: signal,
          });
        } finally {
          cancel();
        }
      };

      try {
        const result = await withRetry(
          attempt,
          config.retry,
          request.abortSignal
        );

        logger.logResponse({
          timestamp: new Date().toISOString(),
          requestId,
          model: candidate,
          provider: providerName,
          durationMs: Date.now() - attemptStart,
          usage: result.usage,
          finishReason: result.finishReason,
        });

        return {
          ...result,
          model: candidate,
          provider: providerName,
          requestId,
        };
      } catch (error) {
        lastError = error;

        logger.logError({
          timestamp: new Date().toISOString(),
          requestId,
          model: candidate,
          provider: providerName,
          durationMs: Date.now() - attemptStart,
          error: describeError(error),
        });

        // 调用方主动取消：不再尝试 fallback
        if (request.abortSignal?.aborted) {
          throw error;
        }
      }
    }

    throw (
      lastError ?? new Error("Model Gateway failed without an explicit error.")
    );
  }

  return { generate };
}
