import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  ERROR_CODES,
  getHttpStatusForCategory,
  type ErrorCode,
  type ErrorCodeDefinition,
  type ExternalPlatform,
} from '@cobra-relay/shared';
import { getRequestId } from './request-context.js';
import { config } from '../config/env.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('API');

/**
 * API error response format
 */
export interface ApiErrorResponse {
  status: number;
  code: string;
  message: string;
  requestId: string;
  details?: Array<{
    field: string;
    message: string;
  }>;
}

/**
 * Application error with standardized error code
 */
export class AppError extends Error {
  public readonly errorCode: ErrorCodeDefinition;
  public readonly httpStatus: number;
  public readonly details?: ApiErrorResponse['details'];

  constructor(
    errorCode: ErrorCode,
    customMessage?: string,
    details?: ApiErrorResponse['details']
  ) {
    const errorDef = ERROR_CODES[errorCode];
    super(customMessage || errorDef.description);

    this.name = new.target.name;
    this.errorCode = errorDef;
    this.httpStatus = getHttpStatusForCategory(errorDef.category);
    this.details = details;
  }
}

/**
 * Webhook secret mismatch, inactive mapping, or bad bot API key
 */
export class AuthenticationError extends AppError {
  constructor(message = 'Webhook authentication failed') {
    super('AUTHENTICATION_FAILED', message);
  }
}

/**
 * Callback body could not be parsed by the platform adapter
 */
export class MalformedPayloadError extends AppError {
  constructor(
    public readonly platform: ExternalPlatform,
    message: string
  ) {
    super('MALFORMED_PAYLOAD', `Malformed ${platform} payload: ${message}`);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, errorCode: 'MAPPING_CONFLICT' | 'ALREADY_PROMOTED' = 'MAPPING_CONFLICT') {
    super(errorCode, message);
  }
}

export class NotFoundError extends AppError {
  constructor(
    resource: 'Mapping' | 'Thread' | 'Message' | 'Event',
    id?: string
  ) {
    const message = id ? `${resource} '${id}' not found` : `${resource} not found`;
    const codes = {
      Mapping: 'MAPPING_NOT_FOUND',
      Thread: 'THREAD_NOT_FOUND',
      Message: 'MESSAGE_NOT_FOUND',
      Event: 'EVENT_NOT_FOUND',
    } as const;
    const code = codes[resource];
    super(code, message);
  }
}

/**
 * Validation error helper
 */
export class ValidationError extends AppError {
  constructor(field: string, message: string) {
    super('VALIDATION_FAILED', message, [{ field, message }]);
  }
}

/**
 * A platform call failed
 */
export class DeliveryError extends AppError {
  public readonly statusCode: number | undefined;
  public readonly timedOut: boolean;

  constructor(
    public readonly platform: ExternalPlatform,
    message: string,
    options: {
      statusCode?: number;
      timedOut?: boolean;
      unsupported?: boolean;
      cause?: unknown;
    } = {}
  ) {
    super(
      options.timedOut
        ? 'DELIVERY_TIMEOUT'
        : options.unsupported
          ? 'PLATFORM_UNSUPPORTED'
          : 'DELIVERY_FAILED',
      message
    );
    this.statusCode = options.statusCode;
    this.timedOut = options.timedOut ?? false;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Format error response
 */
function formatErrorResponse(
  error: unknown,
  requestId: string
): ApiErrorResponse {
  if (error instanceof AppError) {
    return {
      status: error.httpStatus,
      code: error.errorCode.name,
      message: error.message,
      requestId,
      details: error.details,
    };
  }

  if (error instanceof ZodError) {
    const validation = ERROR_CODES.VALIDATION_FAILED;
    return {
      status: 400,
      code: validation.name,
      message: validation.description,
      requestId,
      details: error.errors.map(issue => ({
        field: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  // Unknown error - treat as internal server error
  const internalError = ERROR_CODES.INTERNAL_ERROR;
  return {
    status: 500,
    code: internalError.name,
    message: config.isProd || !(error instanceof Error)
      ? internalError.description
      : error.message || internalError.description,
    requestId,
  };
}

/**
 * Global error handler middleware
 *
 * Must be registered last in the middleware chain.
 */
export function globalErrorHandler() {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId = getRequestId(req);
    const response = formatErrorResponse(err, requestId);

    if (response.status >= 500) {
      log.error({ err, requestId, path: req.path }, 'Request failed');
    } else {
      log.debug({ requestId, path: req.path, code: response.code }, 'Request rejected');
    }

    res.status(response.status).json(response);
  };
}

/**
 * Not found handler - for routes that don't exist
 */
export function notFoundHandler() {
  return (req: Request, _res: Response, next: NextFunction) => {
    next(new AppError('ROUTE_NOT_FOUND', `Route ${req.method} ${req.path} not found`));
  };
}

/**
 * Async handler wrapper - catches async errors and passes to error handler
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Success response helper
 */
export function sendSuccess<T>(
  res: Response,
  data: T,
  status: number = 200
): void {
  res.status(status).json(data);
}

/**
 * Created response helper
 */
export function sendCreated<T>(res: Response, data: T): void {
  sendSuccess(res, data, 201);
}
