import { AppError, ErrorCode } from '../types/error.types';

/**
 * Narrow a raw string (e.g. a database column) to one of a closed set of values
 */
export function parseEnum<T extends string>(values: readonly T[], value: string, label: string): T {
  const match = values.find((candidate) => candidate === value);

  if (match === undefined) {
    throw new AppError(ErrorCode.DATABASE_ERROR, `Unexpected ${label} value: ${value}`, 500, {
      allowed: [...values],
    });
  }

  return match;
}
