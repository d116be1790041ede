// packages/game-core/src/errors.ts
//
// Error types thrown at the edges of game-core. The evaluators are total and
// never throw; these come from input parsing and from custom rule tables.

import type { ZodError, ZodType, ZodTypeDef } from 'zod';

export type ValidationIssue = { path: string; message: string };

export class ValidationError extends Error {
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }

  static fromZod(context: string, error: ZodError): ValidationError {
    const issues = error.issues.map((i) => ({
      path: i.path.join('.'),
      message: i.message,
    }));
    const summary = issues
      .map((i) => (i.path ? `${i.path}: ${i.message}` : i.message))
      .join('; ');
    return new ValidationError(`Invalid ${context}: ${summary}`, issues);
  }
}

/** Thrown when a custom rule table has no rule for a (state, guess) pair. */
export class UnmatchedMoveError extends Error {
  constructor(
    readonly guess: string,
    readonly status: string,
  ) {
    super(`No move rule matched guess "${guess}" in status "${status}"`);
    this.name = 'UnmatchedMoveError';
  }
}

/**
 * parseOrThrow runs a zod schema and rethrows failures as ValidationError.
 *
 * @param context - what is being parsed, used in the error message
 */
export function parseOrThrow<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  input: unknown,
  context: string,
): Output {
  const result = schema.safeParse(input);
  if (!result.success) throw ValidationError.fromZod(context, result.error);
  return result.data;
}
