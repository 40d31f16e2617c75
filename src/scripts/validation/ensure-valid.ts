import type { ErrorObject } from "ajv";
import { formatError, validate } from "../helpers/validation";
import { isRecord, type JsonRecord } from "../helpers/records";
import type { ValidatorKey } from "../schemas";

export interface EnsureValidDiagnostics {
  key: ValidatorKey;
  errors: ErrorObject[];
  messages: string[];
}

/**
 * Raised when a whole document is malformed at the top level. Conversion
 * stops and no partial actor is produced.
 */
export class DocumentStructureError extends Error {
  public readonly diagnostics: EnsureValidDiagnostics;

  constructor(message: string, diagnostics: EnsureValidDiagnostics) {
    super(message);
    this.name = "DocumentStructureError";
    this.diagnostics = diagnostics;
  }
}

export function ensureValid(key: ValidatorKey, payload: unknown, label: string): JsonRecord {
  const result = validate(key, payload);
  if (result.ok && isRecord(payload)) {
    return payload;
  }

  const errors = result.ok ? [] : result.errors;
  const messages = errors.length ? errors.map(formatError) : ["(root): must be object"];
  throw new DocumentStructureError(`${label} failed validation: ${messages.join("; ")}`, {
    key,
    errors,
    messages,
  });
}

export function ensureValidSource(payload: unknown): JsonRecord {
  return ensureValid("sourceDocument", payload, "Hero document");
}
