/**
 * zod building blocks shared by the resource serializers
 */

import { z } from 'zod';
import { zodErrorToFieldErrors, type ValidationResult } from '@shelfwise/platform-core';

export const REQUIRED = 'This field is required.';
export const BLANK = 'This field may not be blank.';
export const NOT_A_STRING = 'Not a valid string.';
export const NOT_AN_INTEGER = 'A valid integer is required.';
export const NOT_AN_OBJECT = 'Invalid data. Expected an object.';

export function maxLength(limit: number): string {
  return `Ensure this field has no more than ${limit} characters.`;
}

export function requiredText(limit: number) {
  return z
    .string({ required_error: REQUIRED, invalid_type_error: NOT_A_STRING })
    .trim()
    .min(1, BLANK)
    .max(limit, maxLength(limit));
}

/** Integers, also as numeric strings: `"1954"` reads as 1954. */
export function integerField(invalidMessage = NOT_AN_INTEGER) {
  return z.preprocess(
    value => (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value) ? Number(value) : value),
    z.number({ required_error: REQUIRED, invalid_type_error: invalidMessage }).int(invalidMessage)
  );
}

export function invalid(error: z.ZodError): { success: false; errors: ReturnType<typeof zodErrorToFieldErrors> } {
  return { success: false, errors: zodErrorToFieldErrors(error) };
}

export function valid<T>(data: T): ValidationResult<T> {
  return { success: true, data };
}
