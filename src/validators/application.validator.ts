import { z } from 'zod';
import { APPLICATION_STATUSES } from '../types/application.types';
import { isoDateTime, positiveInt, uuidParam } from './common.validator';

/**
 * Application validation schemas
 */

// Create application request schema
export const createApplicationSchema = z.object({
  body: z
    .object({
      venue_id: z.string().uuid('Invalid venue ID format'),
      activity_name: z
        .string()
        .trim()
        .min(1, 'Activity name is required')
        .max(255, 'Activity name must be at most 255 characters'),
      activity_description: z.string().max(2000).optional(),
      start_time: isoDateTime('Start time'),
      end_time: isoDateTime('End time'),
      materials: z
        .array(
          z.object({
            material_id: z.string().uuid('Invalid material ID format'),
            quantity: positiveInt('Quantity'),
          })
        )
        .min(1, 'At least one material must be requested'),
    })
    .refine((body) => new Date(body.start_time) < new Date(body.end_time), {
      message: 'Start time must be before end time',
      path: ['end_time'],
    }),
});

// List own applications schema
export const listApplicationsSchema = z.object({
  query: z.object({
    status: z.enum(APPLICATION_STATUSES).optional(),
  }),
});

export const getApplicationSchema = uuidParam('application');
export const cancelApplicationSchema = uuidParam('application');
export const approveApplicationSchema = uuidParam('application');

// Reject application schema
export const rejectApplicationSchema = z.object({
  params: z.object({
    id: z.string().uuid('Invalid application ID format'),
  }),
  body: z.object({
    reason: z
      .string({ required_error: 'A rejection reason is required' })
      .trim()
      .min(1, 'A rejection reason is required')
      .max(1000, 'Reason must be at most 1000 characters'),
  }),
});
