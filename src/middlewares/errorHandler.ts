/**
 * Error Handling Middleware
 *
 * Provides centralized error handling with consistent error response format,
 * error logging, and appropriate error sanitization for production.
 */

import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { logger, getCorrelationId } from '../observability';
import { ErrorCode, ErrorKind, ErrorResponse, errorCodeToStatus } from '../types/errors';
import { OperationFailure } from '../types/results';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
}

interface ApiErrorOptions {
  statusCode?: number;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
  kind?: ErrorKind;
  stage?: string;
  trustlineTxHash?: string;
  resultCodes?: string[];
}

/**
 * API Error class for throwing operational errors
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: Record<string, string[]>;
  kind?: ErrorKind;
  stage?: string;
  trustlineTxHash?: string;
  resultCodes?: string[];

  constructor(errorCode: ErrorCode, message: string, options: ApiErrorOptions = {}) {
    super(message);
    this.name = 'ApiError';
    this.errorCode = errorCode;
    this.statusCode = options.statusCode || errorCodeToStatus[errorCode] || 500;
    this.isOperational = options.isOperational ?? true;
    this.validationErrors = options.validationErrors;
    this.kind = options.kind;
    this.stage = options.stage;
    this.trustlineTxHash = options.trustlineTxHash;
    this.resultCodes = options.resultCodes;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert the error half of an orchestration result into an HTTP error
   */
  static fromFailure(failure: OperationFailure): ApiError {
    return new ApiError(failure.code, failure.message, {
      kind: failure.kind,
      stage: failure.stage,
      trustlineTxHash: failure.trustlineTxHash,
      resultCodes: failure.resultCodes,
    });
  }

  static validationError(
    message: string,
    validationErrors?: Record<string, string[]>
  ): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, {
      kind: ErrorKind.VALIDATION,
      validationErrors,
    });
  }

  static configuration(message: string): ApiError {
    return new ApiError(ErrorCode.CONFIGURATION_ERROR, message, {
      kind: ErrorKind.CONFIGURATION,
      isOperational: false,
    });
  }
}

/**
 * Main error handler middleware
 *
 * Catches all errors and returns a consistent JSON response format.
 * Logs errors with correlation ID for traceability.
 */
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  // Determine error code and status
  const errorCode = err.errorCode || ErrorCode.INTERNAL_ERROR;
  const statusCode = err.statusCode || errorCodeToStatus[errorCode] || 500;

  logger.error(
    {
      correlationId,
      errorCode,
      statusCode,
      error: err.message,
      stack: config.isDevelopment ? err.stack : undefined,
      path: req.path,
      method: req.method,
      isOperational: err.isOperational,
    },
    `Error: ${err.message}`
  );

  // Only non-operational 5xx errors are masked in production
  const message =
    config.isProduction && statusCode >= 500 && !err.isOperational
      ? 'Internal server error'
      : err.message || 'An error occurred';

  const response: ErrorResponse = {
    status: 'error',
    error: {
      code: errorCode,
      message,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  if (err.validationErrors) {
    response.error.details = err.validationErrors;
  }

  if (err instanceof ApiError) {
    if (err.kind) response.error.kind = err.kind;
    if (err.stage) response.error.stage = err.stage;
    if (err.trustlineTxHash) response.error.trustline_tx = err.trustlineTxHash;
    if (err.resultCodes && err.resultCodes.length > 0) {
      response.error.result_codes = err.resultCodes;
    }
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response, _next: NextFunction): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const response: ErrorResponse = {
    status: 'error',
    error: {
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  res.status(404).json(response);
};

/**
 * Async handler wrapper to catch errors in async route handlers
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
