// ---------------------------------------------------------------------------
// Error hierarchy for the request-shield layer.
//
// Routine outcomes (cache miss, rate limit, exhausted quota) are return
// values, not errors. Only misconfiguration and bad input are thrown here;
// exhausted remote failures propagate as whatever the operation threw.
// ---------------------------------------------------------------------------

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all request-shield errors.
 */
export class ResilienceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ResilienceError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value or policy file is missing or invalid. */
export class ConfigurationError extends ResilienceError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

// ── Request errors ──────────────────────────────────────────────────────────

/** Input received by the dispatch layer failed validation. */
export class RequestValidationError extends ResilienceError {
  public readonly field: string;

  constructor(field: string, reason: string, options?: ErrorOptions) {
    super(`Invalid ${field}: ${reason}`, options);
    this.name = "RequestValidationError";
    this.field = field;
  }
}
