import type { ZodIssue } from 'zod';

export type AttackSurfaceErrorCode = 'CONFIGURATION_ERROR' | 'NOT_FOUND';

export class AttackSurfaceError extends Error {
  readonly code: AttackSurfaceErrorCode;

  constructor(code: AttackSurfaceErrorCode, message: string) {
    super(message);
    this.name = 'AttackSurfaceError';
    this.code = code;
  }
}

/**
 * Rejected input: malformed infrastructure definitions, out-of-range scores,
 * or analysis parameters the host refuses to run.
 */
export class ConfigurationError extends AttackSurfaceError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIGURATION_ERROR', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }

  static fromZodIssues(message: string, issues: ZodIssue[]): ConfigurationError {
    return new ConfigurationError(
      message,
      issues.map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${where}: ${issue.message}`;
      }),
    );
  }
}

export class NotFoundError extends AttackSurfaceError {
  constructor(kind: string, id: string) {
    super('NOT_FOUND', `${kind} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

export function httpStatusFor(err: unknown): number {
  if (err instanceof ConfigurationError) return 400;
  if (err instanceof NotFoundError) return 404;
  return 500;
}
