/**
 * Structured Error Factory
 *
 * Builds the error envelope `{ message, errors, status: 'error', code }` that
 * every failing response carries. `errors` maps a field name to its messages;
 * problems that belong to no single field go under `non_field_errors`.
 */

import type { Response } from 'express';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'BAD_REQUEST'
  | 'NOT_FOUND'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'CONFLICT'
  | 'PAYLOAD_TOO_LARGE'
  | 'RATE_LIMITED'
  | 'TIMEOUT'
  | 'SERVICE_UNAVAILABLE'
  | 'DATABASE_ERROR'
  | 'INTERNAL_ERROR';

export const NON_FIELD_ERRORS = 'non_field_errors';

export type FieldErrors = Record<string, string[]>;

export interface ErrorEnvelope {
  message: string;
  errors: FieldErrors;
  status: 'error';
  code: ErrorCode;
  correlationId?: string;
  retryable?: boolean;
}

export function statusCodeToErrorCode(statusCode: number): ErrorCode {
  switch (statusCode) {
    case 400:
      return 'VALIDATION_ERROR';
    case 401:
      return 'UNAUTHORIZED';
    case 403:
      return 'FORBIDDEN';
    case 404:
      return 'NOT_FOUND';
    case 409:
      return 'CONFLICT';
    case 413:
      return 'PAYLOAD_TOO_LARGE';
    case 429:
      return 'RATE_LIMITED';
    case 503:
      return 'SERVICE_UNAVAILABLE';
    case 504:
      return 'TIMEOUT';
    default:
      return statusCode >= 500 ? 'INTERNAL_ERROR' : 'BAD_REQUEST';
  }
}

/**
 * Add a message to a field, creating the list on first use
 */
export function addFieldError(errors: FieldErrors, field: string, message: string): FieldErrors {
  const existing = errors[field];
  if (existing) {
    existing.push(message);
  } else {
    errors[field] = [message];
  }
  return errors;
}

export function isFieldErrors(value: unknown): value is FieldErrors {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    messages => Array.isArray(messages) && messages.every(message => typeof message === 'string')
  );
}

/**
 * Create an error envelope
 */
export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  options?: {
    errors?: FieldErrors;
    correlationId?: string;
    retryable?: boolean;
  }
): ErrorEnvelope {
  const envelope: ErrorEnvelope = {
    message,
    errors: options?.errors && Object.keys(options.errors).length > 0 ? options.errors : { [NON_FIELD_ERRORS]: [message] },
    status: 'error',
    code,
  };

  if (options?.correlationId) {
    envelope.correlationId = options.correlationId;
  }
  if (options?.retryable) {
    envelope.retryable = true;
  }

  return envelope;
}

/**
 * Send an error envelope
 */
export function sendErrorEnvelope(res: Response, statusCode: number, envelope: ErrorEnvelope): void {
  res.status(statusCode).json(envelope);
}

export const StructuredErrors = {
  validation: (res: Response, message: string, options?: { errors?: FieldErrors; correlationId?: string }) =>
    sendErrorEnvelope(res, 400, createErrorEnvelope('VALIDATION_ERROR', message, options)),

  unauthorized: (res: Response, message = 'Authentication credentials were not provided.', correlationId?: string) =>
    sendErrorEnvelope(res, 401, createErrorEnvelope('UNAUTHORIZED', message, { correlationId })),

  forbidden: (res: Response, message = 'You do not have permission to perform this action.', correlationId?: string) =>
    sendErrorEnvelope(res, 403, createErrorEnvelope('FORBIDDEN', message, { correlationId })),

  notFound: (res: Response, resource: string, correlationId?: string) =>
    sendErrorEnvelope(res, 404, createErrorEnvelope('NOT_FOUND', `${resource} not found`, { correlationId })),

  conflict: (res: Response, message: string, options?: { errors?: FieldErrors; correlationId?: string }) =>
    sendErrorEnvelope(res, 409, createErrorEnvelope('CONFLICT', message, options)),

  rateLimited: (res: Response, message = 'Too many requests. Please try again later.', correlationId?: string) =>
    sendErrorEnvelope(res, 429, createErrorEnvelope('RATE_LIMITED', message, { correlationId, retryable: true })),

  serviceUnavailable: (res: Response, message: string, correlationId?: string) =>
    sendErrorEnvelope(
      res,
      503,
      createErrorEnvelope('SERVICE_UNAVAILABLE', message, { correlationId, retryable: true })
    ),

  internal: (res: Response, message = 'Internal server error', correlationId?: string) =>
    sendErrorEnvelope(res, 500, createErrorEnvelope('INTERNAL_ERROR', message, { correlationId })),
};
