import { describe, expect, it } from "vitest";
import {
  InvalidPolicyParamsError,
  UnknownPolicyKindError,
} from "../stages/stage-1-chat-memory/src/errors.js";
import {
  buildProviderConfig,
  DEFAULT_SYSTEM_PROMPT,
  getDefaultModel,
  getFallbackModels,
  getModelProviderMap,
  loadGlobalConfig,
} from "./index.js";

describe("loadGlobalConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadGlobalConfig({})).toEqual({
      googleApiKey: undefined,
      deepseekApiKey: undefined,
      defaultModel: undefined,
      logLevel: "error",
      memory: {
        policy: { kind: "sliding_window", windowSize: 6 },
        temperature: 0.7,
        systemPrompt: DEFAULT_SYSTEM_PROMPT,
      },
    });
  });

  it("reads memory settings from the environment", () => {
    const config = loadGlobalConfig({
      GEMINI_API_KEY: "test-key",
      LOG_LEVEL: "DEBUG",
      MEMORY_POLICY: "summary_window",
      MEMORY_WINDOW_SIZE: "4",
      TEMPERATURE: "1.5",
      SYSTEM_PROMPT: "Be brief.",
    });

    expect(config.googleApiKey).toBe("test-key");
    expect(config.logLevel).toBe("debug");
    expect(config.memory).toEqual({
      policy: { kind: "summary_window", windowSize: 4 },
      temperature: 1,
      systemPrompt: "Be brief.",
    });
  });

  it("falls back to the default temperature on garbage", () => {
    expect(loadGlobalConfig({ TEMPERATURE: "warm" }).memory.temperature).toBe(
      0.7
    );
  });

  it("fails on an unknown policy or a bad window", () => {
    expect(() => loadGlobalConfig({ MEMORY_POLICY: "fifo" })).toThrow(
      UnknownPolicyKindError
    );
    expect(() => loadGlobalConfig({ MEMORY_WINDOW_SIZE: "zero" })).toThrow(
      InvalidPolicyParamsError
    );
  });
});

describe("provider wiring", () => {
  const env = { DEEPSEEK_API_KEY: "test-key" };

  it("registers only providers with a key", () => {
    expect(buildProviderConfig(env)).toEqual({
      deepseek: { apiKey: "test-key", baseUrl: "https://api.deepseek.com/v1" },
    });
  });

  it("maps every known model regardless of keys", () => {
    expect(getModelProviderMap({})).toEqual({
      "gemini-2.0-flash": "google",
      "deepseek-chat": "deepseek",
    });
  });

  it("picks fallbacks and the default model from configured keys", () => {
    expect(getFallbackModels(env)).toEqual(["deepseek-chat"]);
    expect(getDefaultModel(env)).toBe("deepseek-chat");
    expect(
      getDefaultModel({ GOOGLE_API_KEY: "test-key", DEEPSEEK_API_KEY: "test-key" })
    ).toBe("gemini-2.0-flash");
    expect(getDefaultModel({ DEFAULT_MODEL: "deepseek-reasoner" })).toBe(
      "deepseek-reasoner"
    );
  });

  it("requires at least one key", () => {
    expect(() => getDefaultModel({})).toThrow(
      "No API key found. Set GOOGLE_API_KEY (or GEMINI_API_KEY) or DEEPSEEK_API_KEY in .env."
    );
  });
});
