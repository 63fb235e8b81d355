import type { ZodError } from 'zod';

/**
 * Raised for caller mistakes (malformed dates, unknown metrics, out-of-range
 * arguments). Sparse or missing data is never reported through this error.
 */
export class InvalidInputError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'InvalidInputError';
    this.details = details;
  }

  static fromZod(context: string, error: ZodError): InvalidInputError {
    const details = error.issues.map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    return new InvalidInputError(context, details);
  }
}
