/**
 * API error types and Express error handling
 *
 * Chat endpoint failures map to HTTP statuses here. Backend failures
 * inside a tool call never reach this layer: the tool turns them into
 * text for the model.
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { rootLogger, serializeError, type StructuredLogger } from '../observability/logger.js';

// =============================================================================
// Error Codes
// =============================================================================

export const ErrorCodes = {
  VALIDATION_ERROR: 'validation_error',
  UNAUTHORIZED: 'unauthorized',
  AGENT_ERROR: 'agent_error',
  NOT_FOUND: 'not_found',
  PAYLOAD_TOO_LARGE: 'payload_too_large',
  SERVICE_UNAVAILABLE: 'service_unavailable',
  INTERNAL_ERROR: 'internal_error',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Error body returned by every failing API route
 */
export interface ErrorResponseBody {
  error: {
    code: ErrorCode;
    message: string;
  };
}

// =============================================================================
// Base API Error Class
// =============================================================================

export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toResponseBody(): ErrorResponseBody {
    return { error: { code: this.code, message: this.message } };
  }
}

export class ValidationError extends ApiError {
  constructor(message: string) {
    super(400, ErrorCodes.VALIDATION_ERROR, message);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends ApiError {
  constructor(message = 'Authorization header required') {
    super(401, ErrorCodes.UNAUTHORIZED, message);
    this.name = 'UnauthorizedError';
  }
}

/**
 * The model call failed (provider outage, bad key, exhausted steps)
 */
export class AgentError extends ApiError {
  constructor(message: string, public override readonly cause?: unknown) {
    super(500, ErrorCodes.AGENT_ERROR, message);
    this.name = 'AgentError';
  }
}

// =============================================================================
// Backend Errors
// =============================================================================

/**
 * A request to the classroom backend failed.
 * `status` is set when the backend answered with a non-success status,
 * and absent on network failure.
 */
export class ClassroomApiError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public override readonly cause?: unknown
  ) {
    super(message);
    this.name = 'ClassroomApiError';
  }
}

// =============================================================================
// Express Middleware
// =============================================================================

/**
 * body-parser tags its errors with a `type`: 'entity.parse.failed' for
 * malformed JSON, 'entity.too.large' for a body over the limit
 */
function isBodyParserError(error: unknown, type: string): boolean {
  return error instanceof Error && 'type' in error && error.type === type;
}

/**
 * Convert any error into an ApiError
 */
export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }
  if (isBodyParserError(error, 'entity.parse.failed')) {
    return new ValidationError('Request body is not valid JSON');
  }
  if (isBodyParserError(error, 'entity.too.large')) {
    return new ApiError(413, ErrorCodes.PAYLOAD_TOO_LARGE, 'Request body is too large');
  }
  return new ApiError(500, ErrorCodes.INTERNAL_ERROR, 'Internal server error');
}

/**
 * Create the terminal Express error handler
 */
export function createErrorHandler(
  logger: StructuredLogger = rootLogger.child('http')
): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const apiError = toApiError(error);
    const level = apiError.statusCode >= 500 ? 'error' : 'warning';
    logger.log(level, 'Request failed', {
      method: req.method,
      path: req.path,
      status: apiError.statusCode,
      error: serializeError(error),
    });

    res.status(apiError.statusCode).json(apiError.toResponseBody());
  };
}

/**
 * 404 handler for unknown routes
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new ApiError(404, ErrorCodes.NOT_FOUND, `Route not found: ${req.method} ${req.path}`));
}
