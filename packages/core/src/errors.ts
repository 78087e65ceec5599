import type { ZodIssue } from 'zod';

/**
 * Safely extract an error message from an unknown catch value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'Unknown error';
}

function formatIssue(issue: ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Thrown when a query value fails validation at construction time.
 * Raised before any network activity and never retried.
 */
export class QueryValidationError extends Error {
  public readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    super(issues.map(formatIssue).join('; ') || 'Invalid query');
    this.name = 'QueryValidationError';
    this.issues = issues;
  }
}
