import type { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import {
  createErrorEnvelope,
  isFieldErrors,
  sendErrorEnvelope,
  statusCodeToErrorCode,
  type ErrorCode,
  type FieldErrors,
} from '@shelfwise/shared-contracts';
import { getCorrelationId } from '../logging/correlation.js';
import { getLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';

const middlewareLogger = getLogger('error-handling:middleware');

export enum DomainErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  BAD_REQUEST = 'BAD_REQUEST',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  CONFLICT = 'CONFLICT',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
  RATE_LIMITED = 'RATE_LIMITED',
  TIMEOUT = 'TIMEOUT',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  DATABASE_ERROR = 'DATABASE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface DomainErrorDetails {
  /** Field name to messages, rendered as the envelope's `errors`. */
  fields?: FieldErrors;
  retryable?: boolean;
  [key: string]: unknown;
}

export class DomainError extends Error {
  public readonly statusCode: number;
  public readonly cause?: Error;
  public readonly code?: string;
  public readonly details?: DomainErrorDetails;
  public readonly timestamp: Date;

  constructor(message: string, statusCode: number = 500, cause?: Error, code?: string, details?: DomainErrorDetails) {
    super(message);
    this.name = 'DomainError';
    this.statusCode = statusCode;
    this.cause = cause;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get fieldErrors(): FieldErrors | undefined {
    return this.details?.fields;
  }

  get retryable(): boolean {
    return this.details?.retryable === true;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      ...(this.code ? { code: this.code } : {}),
      ...(this.details ? { details: this.details } : {}),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message,
    };
  }
}

export class DomainServiceError<T extends string> extends DomainError {
  public declare readonly code: T;

  constructor(
    message: string,
    statusCode: number,
    code: T,
    cause?: Error,
    serviceName?: string,
    details?: DomainErrorDetails
  ) {
    super(message, statusCode, cause, code, details);
    if (serviceName) this.name = `${serviceName}Error`;
    this.code = code;
  }
}

type StandardCodes<T extends string> = {
  VALIDATION_ERROR: T;
  NOT_FOUND: T;
  UNAUTHORIZED: T;
  FORBIDDEN: T;
  CONFLICT: T;
  SERVICE_UNAVAILABLE: T;
  INTERNAL_ERROR: T;
};

/**
 * Build a per-domain error class with the usual static factories.
 */
export function createDomainServiceError<T extends string>(
  serviceName: string,
  domainErrorCodes: StandardCodes<T> & Record<string, T>
) {
  class ServiceError extends DomainServiceError<T> {
    constructor(message: string, statusCode = 500, code?: T, cause?: Error, details?: DomainErrorDetails) {
      super(message, statusCode, code ?? domainErrorCodes.INTERNAL_ERROR, cause, serviceName, details);
    }

    static notFound(resource: string, id?: string | number) {
      const msg = id !== undefined ? `${resource} not found: ${id}` : `${resource} not found`;
      return new ServiceError(msg, 404, domainErrorCodes.NOT_FOUND);
    }

    static validationError(field: string, message: string) {
      return new ServiceError(message, 400, domainErrorCodes.VALIDATION_ERROR, undefined, {
        fields: { [field]: [message] },
      });
    }

    static invalidFields(fields: FieldErrors, message = 'Validation failed') {
      return new ServiceError(message, 400, domainErrorCodes.VALIDATION_ERROR, undefined, { fields });
    }

    static rule(message: string) {
      return new ServiceError(message, 400, domainErrorCodes.VALIDATION_ERROR);
    }

    static conflict(message: string, fields?: FieldErrors) {
      return new ServiceError(message, 409, domainErrorCodes.CONFLICT, undefined, fields ? { fields } : undefined);
    }

    static unauthorized(message = 'Authentication credentials were not provided.') {
      return new ServiceError(message, 401, domainErrorCodes.UNAUTHORIZED);
    }

    static forbidden(message = 'You do not have permission to perform this action.') {
      return new ServiceError(message, 403, domainErrorCodes.FORBIDDEN);
    }

    static internalError(message: string, cause?: Error) {
      return new ServiceError(message, 500, domainErrorCodes.INTERNAL_ERROR, cause);
    }

    static serviceUnavailable(service: string, cause?: Error) {
      return new ServiceError(`Service unavailable: ${service}`, 503, domainErrorCodes.SERVICE_UNAVAILABLE, cause, {
        retryable: true,
      });
    }
  }

  return ServiceError;
}

const ENVELOPE_CODES: readonly ErrorCode[] = [
  'VALIDATION_ERROR',
  'BAD_REQUEST',
  'NOT_FOUND',
  'UNAUTHORIZED',
  'FORBIDDEN',
  'CONFLICT',
  'PAYLOAD_TOO_LARGE',
  'RATE_LIMITED',
  'TIMEOUT',
  'SERVICE_UNAVAILABLE',
  'DATABASE_ERROR',
  'INTERNAL_ERROR',
];

export function toEnvelopeCode(code: string | undefined, statusCode: number): ErrorCode {
  const match = ENVELOPE_CODES.find(candidate => candidate === code);
  return match ?? statusCodeToErrorCode(statusCode);
}

function correlationIdFor(req: Request): string | undefined {
  const header = req.headers['x-correlation-id'];
  return getCorrelationId() ?? (Array.isArray(header) ? header[0] : header);
}

export function sendErrorResponse(
  res: Response,
  statusCode: number,
  message: string,
  options?: {
    code?: string;
    errors?: FieldErrors;
    correlationId?: string;
    retryable?: boolean;
  }
): void {
  sendErrorEnvelope(
    res,
    statusCode,
    createErrorEnvelope(toEnvelopeCode(options?.code, statusCode), message, {
      errors: options?.errors,
      correlationId: options?.correlationId ?? getCorrelationId(),
      retryable: options?.retryable,
    })
  );
}

/**
 * Shape of the errors body-parser raises for unreadable request bodies
 */
function bodyParserFailure(error: unknown): { statusCode: number; message: string } | null {
  if (typeof error !== 'object' || error === null || !('type' in error)) return null;
  if (error.type === 'entity.parse.failed') return { statusCode: 400, message: 'Malformed request body.' };
  if (error.type === 'entity.too.large') return { statusCode: 413, message: 'Request body is too large.' };
  return null;
}

export function errorHandler(): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const correlationId = correlationIdFor(req);

    if (error instanceof DomainError) {
      const statusCode = error.statusCode;
      middlewareLogger.log(statusCode >= 500 ? 'error' : 'warn', 'DomainError caught', {
        error: error.message,
        statusCode,
        code: error.code,
        correlationId,
        url: req.originalUrl,
        method: req.method,
        ...(error.cause && { cause: serializeError(error.cause) }),
      });

      const fields = error.fieldErrors;
      sendErrorResponse(res, statusCode, statusCode >= 500 && !error.retryable ? 'Internal server error' : error.message, {
        code: error.code,
        errors: fields && isFieldErrors(fields) ? fields : undefined,
        correlationId,
        retryable: error.retryable,
      });
      return;
    }

    const parserFailure = bodyParserFailure(error);
    if (parserFailure) {
      middlewareLogger.warn('Rejected unreadable request body', { correlationId, url: req.originalUrl });
      sendErrorResponse(res, parserFailure.statusCode, parserFailure.message, { correlationId });
      return;
    }

    middlewareLogger.error('Unhandled error', {
      error: serializeError(error),
      correlationId,
      url: req.originalUrl,
      method: req.method,
    });

    sendErrorResponse(res, 500, 'Internal server error', { code: DomainErrorCode.INTERNAL_ERROR, correlationId });
  };
}

/**
 * Forward a rejected handler promise to Express's error pipeline
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

export function notFoundHandler(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    next(new DomainError(`Route ${req.method} ${req.path} not found`, 404, undefined, DomainErrorCode.NOT_FOUND));
  };
}
