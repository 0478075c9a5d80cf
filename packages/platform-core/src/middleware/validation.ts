import { z } from 'zod';
import { addFieldError, NON_FIELD_ERRORS, type FieldErrors } from '@shelfwise/shared-contracts';
import { DomainError, DomainErrorCode } from '../error-handling/errors.js';

/**
 * Collapse zod issues into field → messages, keyed by the dotted path
 */
export function zodErrorToFieldErrors(error: z.ZodError): FieldErrors {
  const fields: FieldErrors = {};
  for (const issue of error.errors) {
    const field = issue.path.length > 0 ? issue.path.join('.') : NON_FIELD_ERRORS;
    addFieldError(fields, field, issue.message);
  }
  return fields;
}

/**
 * Parse a request body, or throw a 400 DomainError carrying the field errors
 * for the error handler to render.
 */
export function parseBody<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
  message = 'Request body validation failed'
): z.output<S> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new DomainError(message, 400, undefined, DomainErrorCode.VALIDATION_ERROR, {
      fields: zodErrorToFieldErrors(parsed.error),
    });
  }
  return parsed.data;
}
