import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createDeepSeekProvider } from "./openai.js";

const fetchMock = vi.fn<[string, RequestInit], Promise<Response>>();

function reply(body: unknown, status = 200): void {
  fetchMock.mockResolvedValueOnce(
    new Response(JSON.stringify(body), { status })
  );
}

describe("createDeepSeekProvider", () => {
  const provider = createDeepSeekProvider({ apiKey: "test-key" });

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts to /chat/completions and maps usage", async () => {
    reply({
      choices: [
        { message: { role: "assistant", content: "hi there" }, finish_reason: "stop" },
      ],
      usage: { prompt_tokens: 7, completion_tokens: 2, total_tokens: 9 },
    });

    const result = await provider.generate({
      model: "deepseek-chat",
      messages: [
        { role: "system", content: "persona" },
        { role: "user", content: "hello" },
      ],
      temperature: 0.5,
    });

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://api.deepseek.com/v1/chat/completions");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-key",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "deepseek-chat",
      messages: [
        { role: "system", content: "persona" },
        { role: "user", content: "hello" },
      ],
      temperature: 0.5,
    });
    expect(result).toMatchObject({
      text: "hi there",
      finishReason: "stop",
      usage: { promptTokens: 7, completionTokens: 2, totalTokens: 9 },
    });
  });

  it("defaults total tokens to prompt + completion", async () => {
    reply({
      choices: [{ message: { content: "ok" } }],
      usage: { prompt_tokens: 4, completion_tokens: 6 },
    });

    const result = await provider.generate({
      model: "deepseek-chat",
      messages: [{ role: "user", content: "hi" }],
    });

    expect(result.usage).toEqual({
      promptTokens: 4,
      completionTokens: 6,
      totalTokens: 10,
    });
  });

  it("leaves usage undefined when the response has none", async () => {
    reply({ choices: [{ message: { content: "ok" } }] });

    const result = await provider.generate({
      model: "deepseek-chat",
      messages: [{ role: "user", content: "hi" }],
    });

    expect(result.usage).toBeUndefined();
  });

  it("rejects a response without an assistant message", async () => {
    reply({ choices: [] });

    await expect(
      provider.generate({
        model: "deepseek-chat",
        messages: [{ role: "user", content: "hi" }],
      })
    ).rejects.toThrow("Response contained no assistant message.");
  });
});
