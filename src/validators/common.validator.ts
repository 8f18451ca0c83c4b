import { z } from 'zod';

/**
 * Shared validation pieces
 */

export const uuidParam = (label: string) =>
  z.object({
    params: z.object({
      id: z.string().uuid(`Invalid ${label} ID format`),
    }),
  });

export const isoDateTime = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .datetime({ offset: true, message: `${label} must be an ISO 8601 date-time` });

export const positiveInt = (label: string) =>
  z
    .number({
      required_error: `${label} is required`,
      invalid_type_error: `${label} must be a number`,
    })
    .int(`${label} must be an integer`)
    .positive(`${label} must be positive`);
