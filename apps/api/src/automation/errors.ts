import type { ZodIssue } from 'zod';

export interface InputIssue {
  path: string;
  message: string;
}

/**
 * Raised when a request body does not match its schema.
 * Scoped to the request that carried it; never fatal.
 */
export class InvalidInputError extends Error {
  constructor(
    message: string,
    public issues: InputIssue[]
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }

  static fromZodIssues(message: string, issues: ZodIssue[]): InvalidInputError {
    return new InvalidInputError(
      message,
      issues.map(issue => ({
        path: issue.path.join('.') || '(root)',
        message: issue.message,
      }))
    );
  }
}
