/**
 * Raised when a transaction cannot satisfy its field constraints, either
 * because a value does not fit its field or because the class-level and
 * inline ranges do not overlap.
 */
export class ConstraintError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = "ConstraintError";
    this.field = field;
  }
}

/**
 * Raised when a bench configuration fails validation.
 * `issues` holds one line per failing key, as `path: message`.
 */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[]) {
    super(issues.length > 0 ? `${message}\n  ${issues.join("\n  ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
