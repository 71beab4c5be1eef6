import type { ZodIssue } from 'zod';

export type FieldError = {
  field: string;
  message: string;
};

export type HttpErrorCode =
  | 'VALIDATION_ERROR'
  | 'INVALID_SIGNATURE'
  | 'RECEIPTS_NOT_ACCEPTED';

/**
 * An error the router raises on purpose. `errorHandler` answers with its status and code as-is.
 */
export class HttpError extends Error {
  readonly name = 'HttpError';

  constructor(
    readonly status: number,
    readonly code: HttpErrorCode,
    message: string,
    readonly details?: { errors: FieldError[] } | Record<string, unknown>
  ) {
    super(message);
  }

  static invalidBody(issues: readonly ZodIssue[]): HttpError {
    return new HttpError(400, 'VALIDATION_ERROR', 'Invalid request body', { errors: toFieldErrors(issues) });
  }

  static invalidSignature(providerName: string): HttpError {
    return new HttpError(401, 'INVALID_SIGNATURE', 'Invalid webhook signature', { providerName });
  }

  static receiptsNotAccepted(providerName: string): HttpError {
    return new HttpError(
      404,
      'RECEIPTS_NOT_ACCEPTED',
      `Channel ${providerName} does not take delivery receipt callbacks`,
      { providerName }
    );
  }
}

// Nested paths are dotted; a root-level issue is reported against `body`. First issue per field wins.
export const toFieldErrors = (issues: readonly ZodIssue[]): FieldError[] =>
  issues.reduce<FieldError[]>((errors, issue) => {
    const field = issue.path.join('.') || 'body';
    return errors.some((error) => error.field === field) ? errors : [...errors, { field, message: issue.message }];
  }, []);
