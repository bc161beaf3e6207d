import type { ValidationError } from "./validate.js";

/**
 * Raised when the constant tables cannot drive a generation run: a missing
 * key, a malformed value or an unusable seed. Carries every violation found.
 */
export class ConfigError extends Error {
  readonly errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    super(formatErrors(errors));
    this.name = "ConfigError";
    this.errors = errors;
  }
}

function formatErrors(errors: ValidationError[]): string {
  const lines = errors.map((e) =>
    e.path ? `  - ${e.path}: ${e.message}` : `  - ${e.message}`
  );
  return `Invalid education config (${errors.length} ${errors.length === 1 ? "error" : "errors"}):\n${lines.join("\n")}`;
}
