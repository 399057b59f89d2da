import type { ProviderName } from "../types.js";
import { ProviderError } from "./types.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value)
    ? value
    : undefined;
}

function asString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// body 只能读一次：先取 text，再尝试按 JSON 解析
async function parseErrorBody(
  response: Response
): Promise<{ message: string; code?: string }> {
  const text = await response.text();
  const payload = tryParseJson(text);
  const error = isRecord(payload) ? payload.error : undefined;
  if (isRecord(error) && typeof error.message === "string") {
    return {
      message: error.message,
      code: asString(error.code) ?? asString(error.status ?? error.type),
    };
  }
  return {
    message: text || `Request failed with status ${response.status}`,
  };
}

/** POST a JSON body and return the parsed JSON payload, or throw ProviderError. */
export async function postJson(
  provider: ProviderName,
  url: string,
  headers: Record<string, string>,
  body: unknown,
  signal: AbortSignal | undefined
): Promise<unknown> {
  const response = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
    signal,
  });

  if (!response.ok) {
    const details = await parseErrorBody(response);
    throw new ProviderError({
      provider,
      message: details.message,
      status: response.status,
      code: details.code,
    });
  }

  const payload: unknown = await response.json();
  return payload;
}
