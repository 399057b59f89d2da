import { describe, expect, it } from "vitest";
import { assistantMessage, userMessage } from "../message.js";
import { createSlidingWindowHistory } from "./sliding-window.js";

const contents = (messages: { content: string }[]) =>
  messages.map((m) => m.content);

describe("createSlidingWindowHistory", () => {
  it("drops the oldest message once the window is full", async () => {
    const history = createSlidingWindowHistory(2);
    await history.append([userMessage("hi"), assistantMessage("hello")]);
    expect(contents(history.read())).toEqual(["hi", "hello"]);

    await history.append([userMessage("bye")]);
    expect(contents(history.read())).toEqual(["hello", "bye"]);
  });

  it("never holds more than k messages", async () => {
    const history = createSlidingWindowHistory(3);
    for (let i = 1; i <= 7; i++) {
      await history.append([userMessage(`m${i}`)]);
      expect(history.read().length).toBeLessThanOrEqual(3);
    }
    expect(contents(history.read())).toEqual(["m5", "m6", "m7"]);
  });

  it("trims a batch larger than the window", async () => {
    const history = createSlidingWindowHistory(2);
    await history.append([
      userMessage("a"),
      userMessage("b"),
      userMessage("c"),
    ]);

    expect(contents(history.read())).toEqual(["b", "c"]);
  });

  it("stays empty with a zero window", async () => {
    const history = createSlidingWindowHistory(0);
    await history.append([userMessage("hi"), assistantMessage("hello")]);

    expect(history.read()).toEqual([]);
  });
});
