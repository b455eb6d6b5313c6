/**
 * Error thrown when a config fails validation at the config boundary.
 *
 * Carries every problem found in one pass (schema errors, duplicate or
 * dangling ids, dependency cycles) so callers can fix them together.
 *
 * @category Config
 */
export class ConfigValidationError extends Error {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    const head = issues.slice(0, 3).join("; ");
    const more = issues.length > 3 ? ` (+${issues.length - 3} more)` : "";
    super(`Invalid config: ${head}${more}`);
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

/**
 * Error thrown when the solver service rejects or fails a request.
 *
 * Contains the HTTP status code and the raw or decoded response body.
 * The optimal strategy maps it to an `ERROR` status instead of rethrowing.
 *
 * @category Solver
 */
export class SolverRequestError extends Error {
  public readonly status: number;
  public readonly data: unknown;

  constructor(message: string, status: number, data: unknown, options?: ErrorOptions) {
    super(message, options);
    this.name = "SolverRequestError";
    this.status = status;
    this.data = data;
  }
}
