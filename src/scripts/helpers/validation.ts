import type { ErrorObject } from "ajv";
import { validators, type ValidatorKey } from "../schemas";

export type ValidationResult = { ok: true } | { ok: false; errors: ErrorObject[] };

export function validate(key: ValidatorKey, data: unknown): ValidationResult {
  const validator = validators[key];
  const valid = validator(data);

  if (valid) {
    return { ok: true };
  }

  const errors = [...(validator.errors ?? [])];
  return { ok: false, errors };
}

export function formatErrorPath(error: ErrorObject): string {
  if (error.keyword === "required") {
    const missing = error.params.missingProperty;
    const basePath = error.instancePath.replace(/\//g, ".").replace(/^\./, "");
    if (typeof missing === "string") {
      return basePath ? `${basePath}.${missing}` : missing;
    }
  }

  return error.instancePath ? error.instancePath.slice(1).replace(/\//g, ".") : "(root)";
}

export function formatError(error: ErrorObject): string {
  const path = formatErrorPath(error);
  return `${path}: ${error.message ?? "is invalid"}`;
}
