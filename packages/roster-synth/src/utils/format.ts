/**
 * Formatting helpers for error messages
 */

export interface IssueLike {
  path: (string | number)[];
  message: string;
}

export function formatIssues(error: { issues: IssueLike[] }, limit = 10): string {
  const lines = error.issues
    .slice(0, limit)
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
  if (error.issues.length > limit) {
    lines.push(`...and ${error.issues.length - limit} more`);
  }
  return lines.join('; ');
}

export function summarize(problems: string[], limit = 5): string {
  const shown = problems.slice(0, limit).join('; ');
  return problems.length > limit ? `${shown}; ...and ${problems.length - limit} more` : shown;
}
