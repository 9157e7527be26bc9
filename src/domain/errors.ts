/**
 * Raised when a timed function cannot be defined from the given input.
 * Thrown at definition time, never from a call.
 */
export class TimedDefinitionError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'TimedDefinitionError';
    this.issues = issues;
  }
}
