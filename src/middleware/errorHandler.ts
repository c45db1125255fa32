import { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { createLogger } from '../utils/logger';

const logger = createLogger('HTTP');

export interface AppError extends Error {
  statusCode: number;
  code: string;
  details?: unknown;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  code = 'VALIDATION_ERROR';

  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class AuthenticationError extends Error implements AppError {
  statusCode = 401;
  code = 'AUTHENTICATION_ERROR';

  constructor(message: string = 'Authentication required') {
    super(message);
    this.name = 'AuthenticationError';
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  code = 'NOT_FOUND_ERROR';

  constructor(message: string = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends Error implements AppError {
  statusCode = 429;
  code = 'RATE_LIMIT_ERROR';

  constructor(message: string = 'Too many requests', public details?: unknown) {
    super(message);
    this.name = 'RateLimitError';
  }
}

export class ExternalServiceError extends Error implements AppError {
  statusCode = 502;
  code = 'EXTERNAL_SERVICE_ERROR';

  constructor(message: string, public service?: string) {
    super(message);
    this.name = 'ExternalServiceError';
  }
}

class InternalServerError extends Error implements AppError {
  statusCode = 500;
  code = 'INTERNAL_SERVER_ERROR';

  constructor(message: string = 'Internal server error') {
    super(message);
    this.name = 'InternalServerError';
  }
}

export interface ErrorResponseBody {
  success: false;
  error: {
    message: string;
    code: string;
    statusCode: number;
    details?: unknown;
    stack?: string;
    correlationId?: string;
  };
}

const isAppError = (error: unknown): error is AppError =>
  error instanceof Error &&
  'statusCode' in error &&
  typeof error.statusCode === 'number' &&
  'code' in error &&
  typeof error.code === 'string';

// body-parser rejects malformed JSON with `type: 'entity.parse.failed'`
const isBodyParseError = (error: unknown): error is Error & { type: string } =>
  error instanceof Error && 'type' in error && error.type === 'entity.parse.failed';

export const formatZodIssues = (error: z.ZodError): Array<{ field: string; message: string; code: string }> =>
  error.errors.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));

// Sanitize sensitive information from error messages
const sanitizeErrorMessage = (message: string): string => {
  return message
    .replace(/password=[^&\s]*/gi, 'password=***')
    .replace(/token=[^&\s]*/gi, 'token=***')
    .replace(/key=[^&\s]*/gi, 'key=***')
    .replace(/secret=[^&\s]*/gi, 'secret=***');
};

export const correlationIdOf = (res: Response): string | undefined => {
  const value: unknown = res.locals.correlationId;
  return typeof value === 'string' ? value : undefined;
};

const toAppError = (error: unknown, isDevelopment: boolean): AppError => {
  if (error instanceof z.ZodError) {
    return new ValidationError('Validation failed', formatZodIssues(error));
  }
  if (isBodyParseError(error)) {
    return new ValidationError('Invalid JSON body');
  }
  if (isAppError(error)) {
    error.message = sanitizeErrorMessage(error.message);
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InternalServerError(isDevelopment ? sanitizeErrorMessage(message) : 'Internal server error');
};

// Global error handler middleware
export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  // If response was already sent, delegate to default Express error handler
  if (res.headersSent) {
    return next(error);
  }

  const isDevelopment = process.env.NODE_ENV === 'development';
  const appError = toAppError(error, isDevelopment);
  const statusCode = appError.statusCode;

  const logMessage = `${req.method} ${req.path} - ${statusCode} - ${appError.message}`;
  if (statusCode >= 500) {
    logger.error(logMessage, {
      error: error instanceof Error ? { name: error.name, message: error.message, stack: error.stack } : error,
      correlationId: correlationIdOf(res),
    });
  } else {
    logger.warn(logMessage);
  }

  const body: ErrorResponseBody = {
    success: false,
    error: {
      message: appError.message,
      code: appError.code,
      statusCode,
      correlationId: correlationIdOf(res),
    },
  };
  if (appError.details !== undefined) {
    body.error.details = appError.details;
  }
  if (isDevelopment && appError.stack) {
    body.error.stack = appError.stack;
  }

  res.status(statusCode).json(body);
};

// Async error wrapper to catch promise rejections
export const catchAsync = (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
};

// 404 handler for unmatched routes
export const notFoundHandler = (req: Request, res: Response, next: NextFunction): void => {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
};

export default errorHandler;
