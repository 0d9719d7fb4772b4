/**
 * Base class for failures the navigator reports to its caller
 */
export class NavigatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A named policy lookup that matched nothing
 */
export class PolicyNotFoundError extends NavigatorError {
  readonly requested: string;
  readonly available: readonly string[];

  constructor(requested: string, available: readonly string[]) {
    super(`Unknown pattern: '${requested}'. Available patterns: ${available.join(', ')}`);
    this.requested = requested;
    this.available = available;
  }
}

/**
 * Policy options rejected at construction time
 */
export class InvalidPolicyError extends NavigatorError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid traversal policy: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
