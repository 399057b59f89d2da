/**
 * Policy construction: closed set of kinds, exhaustive factory, and parsing of
 * untyped caller input (CLI, env) into a PolicySpec.
 */

import { InvalidPolicyParamsError, UnknownPolicyKindError } from "./errors.js";
import { createRecursiveSummaryHistory } from "./policies/recursive-summary.js";
import { createSlidingWindowHistory } from "./policies/sliding-window.js";
import { createSummaryWindowHistory } from "./policies/summary-window.js";
import { createUnboundedHistory } from "./policies/unbounded.js";
import type {
  HistoryPolicy,
  PolicyKind,
  PolicySpec,
  SummarizerDeps,
  WindowedPolicySpec,
} from "./types.js";
import { validateAgainstSchema, type JsonSchema } from "./validate.js";

export const POLICY_KINDS: readonly PolicyKind[] = [
  "unbounded",
  "sliding_window",
  "recursive_summary",
  "summary_window",
];

const POLICY_LABELS: Record<PolicyKind, string> = {
  unbounded: "In-Memory (No Limit)",
  sliding_window: "Sliding Window",
  recursive_summary: "Recursive Summarization",
  summary_window: "Summary + Sliding Window",
};

const WINDOW_PARAMS_SCHEMA: JsonSchema = {
  type: "object",
  properties: {
    windowSize: { type: "integer", minimum: 1 },
  },
  required: ["windowSize"],
};

function normalizeKindName(name: string): string {
  return name.trim().toLowerCase().replace(/[\s_-]+/g, "");
}

const KIND_ALIASES = new Map<string, PolicyKind>(
  POLICY_KINDS.flatMap((kind): Array<[string, PolicyKind]> => [
    [normalizeKindName(kind), kind],
    [normalizeKindName(POLICY_LABELS[kind]), kind],
  ])
);

export function isWindowed(spec: PolicySpec): spec is WindowedPolicySpec {
  return spec.kind === "sliding_window" || spec.kind === "summary_window";
}

/** Kinds whose append may call the LLM to fold history into a summary. */
export function isSummarizing(spec: PolicySpec): boolean {
  return spec.kind === "recursive_summary" || spec.kind === "summary_window";
}

/** Accepts snake_case kinds and the display labels, case- and separator-insensitive. */
export function resolvePolicyKind(name: unknown): PolicyKind {
  const kind =
    typeof name === "string"
      ? KIND_ALIASES.get(normalizeKindName(name))
      : undefined;
  if (!kind) {
    throw new UnknownPolicyKindError(name);
  }
  return kind;
}

function readWindowSize(
  input: Record<string, unknown>,
  kind: PolicyKind
): number {
  const validation = validateAgainstSchema(input, WINDOW_PARAMS_SCHEMA);
  if (!validation.valid) {
    throw new InvalidPolicyParamsError(
      `Invalid parameters for ${kind}`,
      validation.errors
    );
  }
  const { windowSize } = input;
  if (typeof windowSize !== "number") {
    throw new InvalidPolicyParamsError(`Invalid parameters for ${kind}`, [
      "/windowSize must be integer",
    ]);
  }
  return windowSize;
}

/**
 * Parse `{ kind, windowSize? }` from an untrusted source. Unknown kinds fail
 * fast; windowed kinds need an integer window of at least 1.
 */
export function parsePolicySpec(input: unknown): PolicySpec {
  if (typeof input !== "object" || input === null) {
    throw new UnknownPolicyKindError(input);
  }
  const fields: Record<string, unknown> = { ...input };
  const kind = resolvePolicyKind(fields.kind);

  switch (kind) {
    case "unbounded":
    case "recursive_summary":
      return { kind };
    case "sliding_window":
    case "summary_window":
      return { kind, windowSize: readWindowSize(fields, kind) };
  }
}

function assertWindowSize(spec: WindowedPolicySpec): number {
  if (!Number.isInteger(spec.windowSize)) {
    throw new InvalidPolicyParamsError(`Invalid parameters for ${spec.kind}`, [
      "/windowSize must be integer",
    ]);
  }
  return spec.windowSize;
}

/** Build a fresh, empty policy for `spec`. */
export function createHistoryPolicy(
  spec: PolicySpec,
  deps: SummarizerDeps
): HistoryPolicy {
  switch (spec.kind) {
    case "unbounded":
      return createUnboundedHistory();
    case "sliding_window":
      return createSlidingWindowHistory(assertWindowSize(spec));
    case "recursive_summary":
      return createRecursiveSummaryHistory(deps);
    case "summary_window":
      return createSummaryWindowHistory(deps, assertWindowSize(spec));
    default: {
      // reachable only from untyped callers
      const runtime: unknown = spec;
      throw new UnknownPolicyKindError(
        typeof runtime === "object" && runtime !== null && "kind" in runtime
          ? runtime.kind
          : runtime
      );
    }
  }
}

export function describePolicy(spec: PolicySpec): string {
  const label = POLICY_LABELS[spec.kind];
  return isWindowed(spec) ? `${label} (k=${spec.windowSize})` : label;
}
