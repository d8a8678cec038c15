import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { createLogger } from '../../logger.js';

const log = createLogger('api');

/**
 * Error response structure
 */
export interface ErrorResponse {
  error: string;
  message: string;
  details?: unknown;
  stack?: string;
}

/**
 * Custom API error class
 */
export class APIError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public details?: unknown,
  ) {
    super(message);
    this.name = 'APIError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Bad input from a client or a registering worker
 */
export class ValidationError extends APIError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * No live worker could take the batch
 */
export class UnavailableError extends APIError {
  constructor(message: string, details?: unknown) {
    super(503, message, details);
    this.name = 'UnavailableError';
  }
}

/**
 * The coordinator could not store a batch's results
 */
export class StorageError extends APIError {
  constructor(message: string, details?: unknown) {
    super(500, message, details);
    this.name = 'StorageError';
  }
}

/**
 * Errors raised by Express middleware carry their own 4xx status
 */
function isClientHttpError(err: Error): err is Error & { status: number } {
  if (!('status' in err)) {
    return false;
  }
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500;
}

/**
 * Error handling middleware
 *
 * Converts anything thrown in a route into a JSON error response.
 * Upload parser errors are client errors.
 */
export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  let statusCode = 500;
  if (err instanceof APIError) {
    statusCode = err.statusCode;
  } else if (err instanceof multer.MulterError) {
    statusCode = 400;
  } else if (isClientHttpError(err)) {
    // e.g. malformed JSON from the body parser
    statusCode = err.status;
  }

  if (statusCode >= 500) {
    log.error('Request failed', { name: err.name, message: err.message, stack: err.stack });
  } else {
    log.warn(`Request rejected: ${err.message}`, { name: err.name });
  }

  const errorResponse: ErrorResponse = {
    error: err.name || 'InternalServerError',
    message: err.message || 'An unexpected error occurred',
  };

  if (err instanceof APIError && err.details) {
    errorResponse.details = err.details;
  }

  // Include stack trace in development
  if (process.env.NODE_ENV === 'development' && err.stack) {
    errorResponse.stack = err.stack;
  }

  res.status(statusCode).json(errorResponse);
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: 'NotFound',
    message: `Route ${req.method} ${req.path} not found`,
  });
}
