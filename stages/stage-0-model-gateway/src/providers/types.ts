import type {
  GenerateRequest,
  Generation,
  ProviderName,
  Usage,
} from "../types.js";

export interface LLMProvider {
  name: ProviderName;
  generate(request: GenerateRequest): Promise<Generation>;
}

export class ProviderError extends Error {
  readonly provider: ProviderName;
  readonly status?: number;
  readonly code?: string;

  constructor(options: {
    provider: ProviderName;
    message: string;
    status?: number;
    code?: string;
  }) {
    super(options.message);
    this.name = "ProviderError";
    this.provider = options.provider;
    this.status = options.status;
    this.code = options.code;
  }
}

export interface ReportedUsage {
  prompt?: number;
  completion?: number;
  total?: number;
}

/** Normalize provider usage fields; total falls back to prompt + completion. */
export function toUsage(
  reported: ReportedUsage | undefined
): Usage | undefined {
  if (!reported) {
    return undefined;
  }
  const promptTokens = reported.prompt ?? 0;
  const completionTokens = reported.completion ?? 0;
  return {
    promptTokens,
    completionTokens,
    totalTokens: reported.total ?? promptTokens + completionTokens,
  };
}
