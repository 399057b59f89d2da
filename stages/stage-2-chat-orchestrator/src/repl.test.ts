import { Readable, Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import { createMockLanguageModel } from "../../stage-0-model-gateway/src/testing/mock-llm.js";
import type { PolicySpec } from "../../stage-1-chat-memory/src/types.js";
import { createChatOrchestrator } from "./orchestrator.js";
import { createChatRepl, HELP_LINES, runChatRepl } from "./repl.js";

function setup(policy: PolicySpec = { kind: "sliding_window", windowSize: 6 }) {
  const llm = createMockLanguageModel([], { fallback: "hello!" });
  let nextId = 1;
  const orchestrator = createChatOrchestrator({
    llm,
    generateSessionId: () => `sess000${nextId++}`,
  });
  const lines: string[] = [];
  const repl = createChatRepl({
    orchestrator,
    policy,
    temperature: 0.7,
    write: (line) => lines.push(line),
  });
  return { llm, repl, lines };
}

describe("createChatRepl", () => {
  it("prints the reply and token stats for a chat line", async () => {
    const { repl, lines, llm } = setup();

    expect(await repl.handle("hi")).toBe("continue");
    expect(lines).toEqual([
      "AI: hello!",
      "Prompt tokens: 10 | Completion tokens: 5 | Total tokens: 15 | LLM calls: 1",
    ]);
    expect(llm.requests[0]?.temperature).toBe(0.7);
  });

  it("prints nothing for a blank line", async () => {
    const { repl, lines } = setup();

    await repl.handle("   ");

    expect(lines).toEqual([]);
  });

  it("switches technique and keeps the window for windowed kinds", async () => {
    const { repl, lines } = setup({ kind: "sliding_window", windowSize: 4 });

    await repl.handle("/policy recursive_summary");
    await repl.handle("/policy summary window");

    expect(lines).toEqual([
      "Memory: Recursive Summarization",
      "Memory: Summary + Sliding Window (k=4)",
    ]);
    expect(repl.currentKey().policy).toEqual({
      kind: "summary_window",
      windowSize: 4,
    });
  });

  it("takes a trailing number as the window", async () => {
    const { repl, lines } = setup();

    await repl.handle("/policy Sliding Window 3");

    expect(lines).toEqual(["Memory: Sliding Window (k=3)"]);
  });

  it("reports bad policy input and keeps the current one", async () => {
    const { repl, lines } = setup();

    await repl.handle("/policy");
    await repl.handle("/policy fifo");
    await repl.handle("/window 0");

    expect(lines).toEqual([
      "Usage: /policy <kind> [window]",
      '! Unknown memory policy kind: "fifo"',
      "! Invalid parameters for sliding_window: /windowSize must be >= 1",
    ]);
    expect(repl.currentKey().policy).toEqual({
      kind: "sliding_window",
      windowSize: 6,
    });
  });

  it("changes the window or explains there is none", async () => {
    const windowed = setup();
    await windowed.repl.handle("/window 2");
    expect(windowed.lines).toEqual(["Memory: Sliding Window (k=2)"]);

    const unbounded = setup({ kind: "unbounded" });
    await unbounded.repl.handle("/window 2");
    expect(unbounded.lines).toEqual(["In-Memory (No Limit) has no window."]);
  });

  it("validates the temperature", async () => {
    const { repl, lines } = setup();

    await repl.handle("/temp 0.3");
    await repl.handle("/temp 2");
    await repl.handle("/temp");

    expect(lines).toEqual([
      "Temperature: 0.3",
      "Usage: /temp <number between 0 and 1>",
      "Usage: /temp <number between 0 and 1>",
    ]);
    expect(repl.currentTemperature()).toBe(0.3);
  });

  it("renders history and usage", async () => {
    const { repl, lines } = setup();

    await repl.handle("/usage");
    await repl.handle("hi");
    lines.length = 0;
    await repl.handle("/history");
    await repl.handle("/usage");

    expect(lines).toEqual([
      "Type: Sliding Window (k=6) | Messages: 2 | Window: 6 | ID: sess0001",
      "#1 [USER] hi\n#2 [AI] hello!",
      "Prompt tokens: 10 | Completion tokens: 5 | Total tokens: 15 | LLM calls: 1",
    ]);
  });

  it("clears history and starts new sessions", async () => {
    const { repl, lines } = setup();
    await repl.handle("hi");
    lines.length = 0;

    await repl.handle("/clear");
    await repl.handle("/history");
    await repl.handle("/new");

    expect(lines).toEqual([
      "History cleared.",
      "Type: Sliding Window (k=6) | Messages: 0 | Window: 6 | ID: sess0001",
      "(no messages in history yet)",
      "New session: sess0002",
    ]);
    expect(repl.currentKey().sessionId).toBe("sess0002");
  });

  it("lists live histories and marks the current one", async () => {
    const { repl, lines } = setup();
    await repl.handle("hi");
    await repl.handle("/policy unbounded");
    await repl.handle("hi again");
    lines.length = 0;

    await repl.handle("/sessions");

    expect(lines).toEqual([
      "Live histories: 2",
      "  sess0001::sliding_window::k=6",
      "* sess0001::unbounded",
    ]);
  });

  it("lists commands, rejects unknown ones and exits", async () => {
    const { repl, lines } = setup();

    await repl.handle("/help");
    expect(lines).toEqual([...HELP_LINES]);

    lines.length = 0;
    expect(await repl.handle("/bogus")).toBe("continue");
    expect(lines).toEqual(["Unknown command: /bogus (type /help)"]);
    expect(await repl.handle("/exit")).toBe("exit");
  });
});

describe("runChatRepl", () => {
  it("reads lines until /exit", async () => {
    const llm = createMockLanguageModel([], { fallback: "hello!" });
    const orchestrator = createChatOrchestrator({
      llm,
      generateSessionId: () => "sess0001",
    });
    const chunks: string[] = [];
    const output = new Writable({
      write(chunk, _encoding, callback) {
        chunks.push(String(chunk));
        callback();
      },
    });

    await runChatRepl({
      orchestrator,
      policy: { kind: "sliding_window", windowSize: 6 },
      temperature: 0.7,
      input: Readable.from(["hi\n/exit\nignored\n"]),
      output,
    });

    const text = chunks.join("");
    expect(text.startsWith(
      "Session sess0001 | Sliding Window (k=6) | /help for commands\n"
    )).toBe(true);
    expect(text).toContain("AI: hello!\n");
    expect(llm.requests).toHaveLength(1);
  });
});
