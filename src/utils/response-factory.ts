import { ApiSuccessResponse, ApiListResponse, ApiErrorResponse } from '../types/api.types';
import { ErrorCode } from '../types/error.types';

export function createSuccessResponse<T>(data: T, message?: string): ApiSuccessResponse<T> {
  return message ? { data, message } : { data };
}

/**
 * Collection payload with its size
 */
export function createListResponse<T>(items: T[]): ApiListResponse<T> {
  return {
    data: items,
    meta: { count: items.length },
  };
}

export function createErrorResponse(
  code: ErrorCode | 'NOT_FOUND',
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse {
  return {
    error: {
      code,
      message,
      ...(details && { details }),
    },
  };
}
