import type { ZodError } from 'zod';

/**
 * One-line summary of schema issues for MalformedPayloadError
 */
export function formatIssues(error: ZodError): string {
  return error.errors
    .slice(0, 3)
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
