import { describe, it, expect } from 'vitest';
import {
  addFieldError,
  createErrorEnvelope,
  isFieldErrors,
  statusCodeToErrorCode,
  NON_FIELD_ERRORS,
} from '../common/error-factory';
import { buildPaginationMeta, createListEnvelope, createSuccessEnvelope } from '../api/envelope';
import { RoleSchema, RegisterRequestSchema } from '../api/auth-schemas';

describe('createErrorEnvelope', () => {
  it('should keep field errors when provided', () => {
    const envelope = createErrorEnvelope('VALIDATION_ERROR', 'Validation failed', {
      errors: { title: ['This field is required.'] },
    });

    expect(envelope).toEqual({
      message: 'Validation failed',
      errors: { title: ['This field is required.'] },
      status: 'error',
      code: 'VALIDATION_ERROR',
    });
  });

  it('should fall back to non_field_errors with the message', () => {
    const envelope = createErrorEnvelope('NOT_FOUND', 'Book not found', { correlationId: 'abc' });

    expect(envelope.errors).toEqual({ [NON_FIELD_ERRORS]: ['Book not found'] });
    expect(envelope.correlationId).toBe('abc');
    expect(envelope.retryable).toBeUndefined();
  });

  it('should flag retryable failures', () => {
    expect(createErrorEnvelope('SERVICE_UNAVAILABLE', 'Store timed out', { retryable: true }).retryable).toBe(true);
  });
});

describe('statusCodeToErrorCode', () => {
  it('should map common status codes', () => {
    expect(statusCodeToErrorCode(400)).toBe('VALIDATION_ERROR');
    expect(statusCodeToErrorCode(401)).toBe('UNAUTHORIZED');
    expect(statusCodeToErrorCode(409)).toBe('CONFLICT');
    expect(statusCodeToErrorCode(502)).toBe('INTERNAL_ERROR');
    expect(statusCodeToErrorCode(418)).toBe('BAD_REQUEST');
  });
});

describe('field errors', () => {
  it('should append to existing fields', () => {
    const errors = addFieldError({}, 'title', 'first');
    addFieldError(errors, 'title', 'second');

    expect(errors).toEqual({ title: ['first', 'second'] });
    expect(isFieldErrors(errors)).toBe(true);
    expect(isFieldErrors({ title: 'nope' })).toBe(false);
    expect(isFieldErrors(['title'])).toBe(false);
  });
});

describe('success envelopes', () => {
  it('should place data under its key', () => {
    expect(createSuccessEnvelope('Book retrieved successfully', 'book', { id: 1 })).toEqual({
      message: 'Book retrieved successfully',
      book: { id: 1 },
      status: 'success',
    });
  });

  it('should compute pagination links', () => {
    expect(buildPaginationMeta(45, 2, 20)).toEqual({
      count: 45,
      page: 2,
      page_size: 20,
      total_pages: 3,
      next_page: 3,
      previous_page: 1,
    });
    expect(buildPaginationMeta(0, 1, 20)).toEqual({
      count: 0,
      page: 1,
      page_size: 20,
      total_pages: 0,
      next_page: null,
      previous_page: null,
    });
  });

  it('should include query capabilities on lists', () => {
    const envelope = createListEnvelope('Books retrieved successfully', 'books', [], buildPaginationMeta(0, 1, 20), {
      available_filters: ['author'],
      available_search: ['title'],
      available_ordering: ['title'],
    });

    expect(envelope.available_filters).toEqual(['author']);
    expect(envelope.books).toEqual([]);
    expect(envelope.status).toBe('success');
  });
});

describe('request schemas', () => {
  it('should resolve role aliases', () => {
    expect(RoleSchema.parse('Editor')).toBe('librarian');
    expect(RoleSchema.safeParse('superuser').success).toBe(false);
  });

  it('should reject short passwords', () => {
    const result = RegisterRequestSchema.safeParse({ username: 'ada', password: 'short' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.errors[0].path).toEqual(['password']);
    }
  });
});
