import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, ErrorCode, StoreConflictError } from '../types/error.types';
import { createErrorResponse } from '../utils/response-factory';
import { logger } from '../config/logger';
import { fieldErrors } from './validation.middleware';

/**
 * Global error handling middleware
 *
 * Catches all errors and returns consistent error responses
 */
export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  // AppError (known application errors)
  if (err instanceof AppError) {
    logger.log(err.statusCode >= 500 ? 'error' : 'warn', 'Request failed', {
      code: err.code,
      error: err.message,
      path: req.path,
      method: req.method,
    });
    return res.status(err.statusCode).json(createErrorResponse(err.code, err.message, err.details));
  }

  // Zod errors from a schema no route validated first
  if (err instanceof ZodError) {
    const errors = fieldErrors(err);

    logger.warn('Validation failed', { path: req.path, method: req.method, errors });
    return res
      .status(400)
      .json(createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Validation failed', { errors }));
  }

  // Malformed JSON body
  if (err instanceof SyntaxError && 'body' in err) {
    return res
      .status(400)
      .json(createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Malformed JSON body'));
  }

  logger.error('Error occurred', {
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
    body: req.body,
  });

  // Version races that outlived the store's retries
  if (err instanceof StoreConflictError) {
    return res
      .status(503)
      .json(createErrorResponse(ErrorCode.STORE_CONTENTION, 'The resource is busy, please retry the request'));
  }

  // Unknown errors - don't expose internals
  return res
    .status(500)
    .json(createErrorResponse(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred'));
};

/**
 * 404 Not Found handler
 */
export const notFoundHandler = (req: Request, res: Response) => {
  res
    .status(404)
    .json(createErrorResponse('NOT_FOUND', `Route ${req.method} ${req.path} not found`));
};
