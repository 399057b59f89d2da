import { describe, expect, it } from "vitest";
import { createMockLanguageModel } from "../../stage-0-model-gateway/src/testing/mock-llm.js";
import {
  createUsageAccumulator,
  withUsageTracking,
  zeroUsage,
} from "./usage.js";

describe("createUsageAccumulator", () => {
  it("sums every recorded call", () => {
    const usage = createUsageAccumulator();
    usage.record({ promptTokens: 10, completionTokens: 5, totalTokens: 15 });
    usage.record({ promptTokens: 20, completionTokens: 7, totalTokens: 27 });
    usage.record({ promptTokens: 1, completionTokens: 1, totalTokens: 2 });

    expect(usage.snapshot()).toEqual({
      promptTokens: 31,
      completionTokens: 13,
      totalTokens: 44,
      calls: 3,
      unreportedCalls: 0,
    });
  });

  it("counts calls without usage separately", () => {
    const usage = createUsageAccumulator();
    usage.record(undefined);
    usage.record({ promptTokens: 3, completionTokens: 2, totalTokens: 5 });

    expect(usage.snapshot()).toEqual({
      promptTokens: 3,
      completionTokens: 2,
      totalTokens: 5,
      calls: 1,
      unreportedCalls: 1,
    });
  });

  it("ignores negative and non-finite counts", () => {
    const usage = createUsageAccumulator();
    usage.record({ promptTokens: 3.7, completionTokens: -2, totalTokens: NaN });

    expect(usage.snapshot()).toMatchObject({
      promptTokens: 3,
      completionTokens: 0,
      totalTokens: 0,
      calls: 1,
    });
  });

  it("returns detached snapshots and resets to zero", () => {
    const usage = createUsageAccumulator();
    usage.record({ promptTokens: 1, completionTokens: 1, totalTokens: 2 });
    const before = usage.snapshot();
    usage.reset();

    expect(before.totalTokens).toBe(2);
    expect(usage.snapshot()).toEqual(zeroUsage());
  });
});

describe("withUsageTracking", () => {
  it("records each completed call", async () => {
    const llm = createMockLanguageModel(["a", "b"]);
    const usage = createUsageAccumulator();
    const tracked = withUsageTracking(llm, usage);

    await tracked.generate({ messages: [] });
    await tracked.generate({ messages: [] });

    expect(usage.snapshot()).toMatchObject({ totalTokens: 30, calls: 2 });
  });

  it("does not record failed calls", async () => {
    const llm = createMockLanguageModel([new Error("down")]);
    const usage = createUsageAccumulator();

    await expect(
      withUsageTracking(llm, usage).generate({ messages: [] })
    ).rejects.toThrow("down");
    expect(usage.snapshot()).toEqual(zeroUsage());
  });

  it("returns the model unchanged without an accumulator", () => {
    const llm = createMockLanguageModel();
    expect(withUsageTracking(llm, undefined)).toBe(llm);
  });
});
