import type {
  GenerateRequest,
  Generation,
  GoogleConfig,
  Message,
} from "../types.js";
import { isRecord, optionalNumber, postJson } from "./http.js";
import { ProviderError, toUsage, type LLMProvider } from "./types.js";

const DEFAULT_GOOGLE_BASE_URL =
  "https://generativelanguage.googleapis.com/v1beta";

type ContentItem =
  | { role: "user" | "model"; parts: Array<{ text: string }> }
  | { parts: Array<{ text: string }> };

/** Gemini takes system text separately; running summaries and persona are merged there. */
function extractSystem(messages: readonly Message[]): {
  system?: string;
  contents: ContentItem[];
} {
  const systemParts: string[] = [];
  const contents: ContentItem[] = [];

  for (const message of messages) {
    if (message.role === "system") {
      systemParts.push(message.content);
    } else {
      const role = message.role === "assistant" ? "model" : "user";
      contents.push({ role, parts: [{ text: message.content }] });
    }
  }

  const system = systemParts.length > 0 ? systemParts.join("\n\n") : undefined;

  // Single-turn: one user message only. Match official format without role.
  const only = contents.length === 1 ? contents[0] : undefined;
  if (only && "role" in only && only.role === "user") {
    return { system, contents: [{ parts: only.parts }] };
  }

  return { system, contents };
}

function readCandidate(payload: unknown): {
  text: string;
  finishReason?: string;
  found: boolean;
} {
  const candidates = isRecord(payload) ? payload.candidates : undefined;
  const first = Array.isArray(candidates) ? candidates[0] : undefined;
  if (!isRecord(first)) {
    return { text: "", found: false };
  }
  const finishReason =
    typeof first.finishReason === "string" ? first.finishReason : undefined;
  const content = first.content;
  const parts = isRecord(content) ? content.parts : undefined;
  const text = Array.isArray(parts)
    ? parts
        .map((p) => (isRecord(p) && typeof p.text === "string" ? p.text : ""))
        .join("")
    : "";
  return { text, finishReason, found: true };
}

export function createGoogleProvider(config: GoogleConfig): LLMProvider {
  return {
    name: "google",
    async generate(request: GenerateRequest): Promise<Generation> {
      if (!request.model) {
        throw new ProviderError({
          provider: "google",
          message: "Model is required for Google Gemini.",
        });
      }
      if (!config.apiKey) {
        throw new ProviderError({
          provider: "google",
          message: "API key is required for Google Gemini.",
        });
      }

      const baseUrl = config.baseUrl ?? DEFAULT_GOOGLE_BASE_URL;
      const { system, contents } = extractSystem(request.messages);

      const body: Record<string, unknown> = {
        contents,
        generationConfig: {
          temperature: request.temperature ?? 0.7,
          maxOutputTokens: request.maxTokens,
        },
      };
      if (system) {
        body.systemInstruction = { parts: [{ text: system }] };
      }

      const payload = await postJson(
        "google",
        `${baseUrl}/models/${request.model}:generateContent`,
        { "x-goog-api-key": config.apiKey },
        body,
        request.abortSignal
      );

      const candidate = readCandidate(payload);
      if (!candidate.found || candidate.text === "") {
        throw new ProviderError({
          provider: "google",
          message: candidate.finishReason
            ? `Gemini returned no text (finishReason: ${candidate.finishReason}).`
            : "Gemini returned no candidates or empty content (possible safety filter or empty response).",
        });
      }

      const metadata = isRecord(payload) ? payload.usageMetadata : undefined;
      const usage = isRecord(metadata)
        ? toUsage({
            prompt: optionalNumber(metadata.promptTokenCount),
            completion: optionalNumber(metadata.candidatesTokenCount),
            total: optionalNumber(metadata.totalTokenCount),
          })
        : undefined;

      return {
        text: candidate.text,
        finishReason: candidate.finishReason,
        usage,
        raw: payload,
      };
    },
  };
}
