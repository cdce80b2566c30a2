import type { ZodError } from 'zod';

/** One line per issue: `path.to.field: message` */
export function formatIssues(error: ZodError, source: string): string {
  const lines = error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `  ${path}: ${issue.message}`;
  });
  return `Invalid ${source}:\n${lines.join('\n')}`;
}
