import type { z } from 'zod';

const MAX_LISTED_ISSUES = 3;

/**
 * Summarize zod issues as "path: message" pairs, e.g.
 * `[0].associated[2].type: Required; [5].id: Required (+4 more)`
 */
export function describeIssues(error: z.ZodError): string {
  const listed = error.issues.slice(0, MAX_LISTED_ISSUES).map((issue) => {
    const path = issue.path
      .map((segment) => (typeof segment === 'number' ? `[${segment}]` : `.${segment}`))
      .join('')
      .replace(/^\./, '');
    return path ? `${path}: ${issue.message}` : issue.message;
  });

  const remaining = error.issues.length - listed.length;
  const suffix = remaining > 0 ? ` (+${remaining} more)` : '';
  return `${listed.join('; ')}${suffix}`;
}
