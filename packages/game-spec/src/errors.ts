import type { ZodIssue } from 'zod';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: ZodIssue[],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function describeIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
