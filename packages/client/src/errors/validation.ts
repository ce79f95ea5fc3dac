import type { ZodError, ZodIssue } from 'zod';
import { HttpClientError } from './base.js';

function formatIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.map(String).join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}

/**
 * A value failed its zod schema: an option argument when the option is
 * created, or a decoded body in `readJSONBody`
 */
export class ValidationError extends HttpClientError {
  public readonly issues: readonly ZodIssue[];

  constructor(subject: string, error: ZodError) {
    super(`${subject}: ${formatIssues(error.issues)}`, { cause: error });
    this.issues = error.issues;
  }
}

/**
 * Body text is not JSON
 */
export class DecodeError extends HttpClientError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

/**
 * `postJSON` value cannot be encoded; raised before any request is sent
 */
export class SerializationError extends HttpClientError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}
