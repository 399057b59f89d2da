/**
 * Validate untyped caller input against JSON Schema (using ajv).
 */

import AjvImport, { type ErrorObject } from "ajv";

/** JSON Schema (draft-07 style). */
export type JsonSchema = Record<string, unknown>;

export type ValidationResult =
  | { valid: true }
  | { valid: false; errors: string[] };

interface AjvInstance {
  validate(schema: JsonSchema, data: unknown): boolean;
  errors?: ErrorObject[] | null;
}

type AjvCtor = new (opts?: { allErrors?: boolean }) => AjvInstance;

function hasDefault(value: unknown): value is { default: AjvCtor } {
  return typeof value === "object" && value !== null && "default" in value;
}

// ajv 以 CJS 发布：在 NodeNext 下 default 可能再包一层
const AjvConstructor: AjvCtor = hasDefault(AjvImport)
  ? AjvImport.default
  : AjvImport;

const ajv = new AjvConstructor({ allErrors: true });

function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return ["Validation failed"];
  }
  return errors.map(
    (e) => `${e.instancePath || "/"} ${e.message ?? e.keyword}`
  );
}

export function validateAgainstSchema(
  data: unknown,
  schema: JsonSchema
): ValidationResult {
  if (ajv.validate(schema, data)) {
    return { valid: true };
  }
  return { valid: false, errors: formatAjvErrors(ajv.errors) };
}
