/**
 * Shared Response Helpers
 *
 * Service-scoped helpers that render the success and error envelopes.
 *
 * Usage:
 *   const { sendSuccess, sendCreated, ServiceErrors } = createResponseHelpers('library-service');
 *   sendSuccess(res, 'Profile retrieved successfully', 'profile', profile);
 */

import type { Response } from 'express';
import {
  StructuredErrors,
  createSuccessEnvelope,
  type ErrorEnvelope,
  type FieldErrors,
  type SuccessEnvelope,
} from '@shelfwise/shared-contracts';
import { DomainError, sendErrorResponse } from '../error-handling/errors.js';
import { getCorrelationId } from '../logging/correlation.js';
import { getLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';

export interface ServiceErrorHelpers {
  fromException: (res: Response, error: unknown, fallbackMessage: string) => void;
  notFound: (res: Response, resource: string) => void;
  badRequest: (res: Response, message: string, errors?: FieldErrors) => void;
  unauthorized: (res: Response, message?: string) => void;
  forbidden: (res: Response, message?: string) => void;
  conflict: (res: Response, message: string, errors?: FieldErrors) => void;
}

export interface ResponseHelpers {
  sendSuccess: (res: Response, message: string, dataKey: string, data: unknown, statusCode?: number) => void;
  sendCreated: (res: Response, message: string, dataKey: string, data: unknown) => void;
  sendEnvelope: (res: Response, statusCode: number, envelope: SuccessEnvelope | ErrorEnvelope) => void;
  ServiceErrors: ServiceErrorHelpers;
}

function createServiceErrors(serviceName: string): ServiceErrorHelpers {
  const logger = getLogger(`${serviceName}:responses`);

  return {
    fromException: (res, error, fallbackMessage) => {
      if (error instanceof DomainError) {
        const hideMessage = error.statusCode >= 500 && !error.retryable;
        sendErrorResponse(res, error.statusCode, hideMessage ? fallbackMessage : error.message, {
          code: error.code,
          errors: error.fieldErrors,
          retryable: error.retryable,
        });
        return;
      }
      logger.error(fallbackMessage, { error: serializeError(error), correlationId: getCorrelationId() });
      StructuredErrors.internal(res, fallbackMessage, getCorrelationId());
    },

    notFound: (res, resource) => StructuredErrors.notFound(res, resource, getCorrelationId()),

    badRequest: (res, message, errors) =>
      StructuredErrors.validation(res, message, { errors, correlationId: getCorrelationId() }),

    unauthorized: (res, message) => StructuredErrors.unauthorized(res, message, getCorrelationId()),

    forbidden: (res, message) => StructuredErrors.forbidden(res, message, getCorrelationId()),

    conflict: (res, message, errors) =>
      StructuredErrors.conflict(res, message, { errors, correlationId: getCorrelationId() }),
  };
}

export function createResponseHelpers(serviceName: string): ResponseHelpers {
  return {
    sendSuccess: (res, message, dataKey, data, statusCode = 200) => {
      res.status(statusCode).json(createSuccessEnvelope(message, dataKey, data));
    },
    sendCreated: (res, message, dataKey, data) => {
      res.status(201).json(createSuccessEnvelope(message, dataKey, data));
    },
    sendEnvelope: (res, statusCode, envelope) => {
      res.status(statusCode).json(envelope);
    },
    ServiceErrors: createServiceErrors(serviceName),
  };
}
