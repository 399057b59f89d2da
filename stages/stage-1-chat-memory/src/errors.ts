export class UnknownPolicyKindError extends Error {
  readonly kind: unknown;

  constructor(kind: unknown) {
    super(
      `Unknown memory policy kind: ${
        typeof kind === "string" ? `"${kind}"` : String(kind)
      }`
    );
    this.name = "UnknownPolicyKindError";
    this.kind = kind;
  }
}

export class InvalidPolicyParamsError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(errors.length > 0 ? `${message}: ${errors.join("; ")}` : message);
    this.name = "InvalidPolicyParamsError";
    this.errors = errors;
  }
}

/** The summarizer call succeeded but produced nothing usable. */
export class SummarizationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SummarizationError";
  }
}
