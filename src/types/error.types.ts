/**
 * Error types and codes
 */

// Standard error codes
export enum ErrorCode {
  // Validation errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  // Identity errors (401 / 403)
  UNAUTHENTICATED = 'UNAUTHENTICATED',
  PERMISSION_DENIED = 'PERMISSION_DENIED',

  // Not found errors (404)
  VENUE_NOT_FOUND = 'VENUE_NOT_FOUND',
  MATERIAL_NOT_FOUND = 'MATERIAL_NOT_FOUND',
  APPLICATION_NOT_FOUND = 'APPLICATION_NOT_FOUND',

  // Conflict errors (409)
  RESOURCE_UNAVAILABLE = 'RESOURCE_UNAVAILABLE',
  SCHEDULING_CONFLICT = 'SCHEDULING_CONFLICT',
  INSUFFICIENT_INVENTORY = 'INSUFFICIENT_INVENTORY',
  INVALID_STATE_TRANSITION = 'INVALID_STATE_TRANSITION',
  DUPLICATE_NAME = 'DUPLICATE_NAME',

  // Store errors (5xx)
  STORE_CONTENTION = 'STORE_CONTENTION',
  DATABASE_ERROR = 'DATABASE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// Custom application error class
export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised by a store when a commit lost an optimistic version check.
 * The store retries the unit of work; callers above the store never see it
 * unless retries run out.
 */
export class StoreConflictError extends Error {
  constructor(message = 'Concurrent modification detected') {
    super(message);
    this.name = 'StoreConflictError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export const duplicateMaterialName = (name: string): AppError =>
  new AppError(ErrorCode.DUPLICATE_NAME, `A material named "${name}" already exists`, 409, { name });
