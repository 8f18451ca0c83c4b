import { RequestHandler } from 'express';
import { AnyZodObject, ZodError } from 'zod';
import { ErrorCode } from '../types/error.types';
import { createErrorResponse } from '../utils/response-factory';
import { logger } from '../config/logger';

export interface FieldError {
  field: string;
  message: string;
}

export const fieldErrors = (error: ZodError): FieldError[] =>
  error.errors.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));

/**
 * Validation middleware factory
 *
 * Validates request data (body, params, query) against a Zod schema and
 * answers 400 before the controller runs. Controllers read the typed
 * values with parseRequest().
 *
 * Usage:
 * ```typescript
 * router.post('/', requireActor, validate(createVenueSchema), venueController.createVenue);
 * ```
 */
export const validate = (schema: AnyZodObject): RequestHandler => {
  return (req, res, next) => {
    const result = schema.safeParse({
      body: req.body,
      params: req.params,
      query: req.query,
    });

    if (result.success) {
      next();
      return;
    }

    const errors = fieldErrors(result.error);
    logger.warn('Validation failed', { path: req.path, method: req.method, errors });
    res
      .status(400)
      .json(createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Validation failed', { errors }));
  };
};
