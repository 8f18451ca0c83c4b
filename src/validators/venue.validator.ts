import { z } from 'zod';
import { VENUE_STATUSES } from '../types/venue.types';
import { isoDateTime, positiveInt, uuidParam } from './common.validator';

/**
 * Venue validation schemas
 */

const venueFields = {
  name: z.string().trim().min(1, 'Name is required').max(255, 'Name must be at most 255 characters'),
  location: z.string().trim().min(1, 'Location is required').max(255),
  capacity: positiveInt('Capacity'),
  description: z.string().max(2000),
  equipment: z.array(z.string().trim().min(1)).max(100),
};

export const createVenueSchema = z.object({
  body: z.object({
    ...venueFields,
    description: venueFields.description.default(''),
    equipment: venueFields.equipment.optional(),
    status: z.enum(VENUE_STATUSES).optional(),
  }),
});

export const updateVenueSchema = z.object({
  params: z.object({
    id: z.string().uuid('Invalid venue ID format'),
  }),
  body: z
    .object({
      name: venueFields.name.optional(),
      location: venueFields.location.optional(),
      capacity: venueFields.capacity.optional(),
      description: venueFields.description.optional(),
      equipment: venueFields.equipment.optional(),
    })
    .strict()
    .refine((body) => Object.keys(body).length > 0, 'At least one field must be provided'),
});

export const setVenueStatusSchema = z.object({
  params: z.object({
    id: z.string().uuid('Invalid venue ID format'),
  }),
  body: z.object({
    status: z.enum(VENUE_STATUSES),
  }),
});

export const listVenuesSchema = z.object({
  query: z.object({
    status: z.enum(VENUE_STATUSES).optional(),
  }),
});

export const availableVenuesSchema = z.object({
  query: z
    .object({
      start_time: isoDateTime('Start time'),
      end_time: isoDateTime('End time'),
    })
    .refine((query) => new Date(query.start_time) < new Date(query.end_time), {
      message: 'Start time must be before end time',
      path: ['end_time'],
    }),
});

export const getVenueSchema = uuidParam('venue');
export const deleteVenueSchema = uuidParam('venue');
