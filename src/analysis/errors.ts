/**
 * Raised when an extraction call receives something other than text,
 * invalid options, or text over the configured size limit.
 */
export class InvalidInputError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "InvalidInputError";
    this.issues = issues;
  }
}
