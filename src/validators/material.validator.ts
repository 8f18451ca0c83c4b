import { z } from 'zod';
import { MATERIAL_STATUSES } from '../types/material.types';
import { uuidParam } from './common.validator';

/**
 * Material validation schemas
 */

const quantity = z
  .number({
    required_error: 'Total quantity is required',
    invalid_type_error: 'Total quantity must be a number',
  })
  .int('Total quantity must be an integer')
  .nonnegative('Total quantity must not be negative');

const materialFields = {
  name: z.string().trim().min(1, 'Name is required').max(64, 'Name must be at most 64 characters'),
  category: z.string().trim().min(1, 'Category is required').max(64),
  unit: z.string().trim().min(1, 'Unit is required').max(10),
  description: z.string().max(2000),
};

export const createMaterialSchema = z.object({
  body: z.object({
    ...materialFields,
    description: materialFields.description.default(''),
    total_quantity: quantity,
    status: z.enum(MATERIAL_STATUSES).optional(),
  }),
});

export const updateMaterialSchema = z.object({
  params: z.object({
    id: z.string().uuid('Invalid material ID format'),
  }),
  body: z
    .object({
      name: materialFields.name.optional(),
      category: materialFields.category.optional(),
      unit: materialFields.unit.optional(),
      description: materialFields.description.optional(),
    })
    .strict()
    .refine((body) => Object.keys(body).length > 0, 'At least one field must be provided'),
});

export const setMaterialStatusSchema = z.object({
  params: z.object({
    id: z.string().uuid('Invalid material ID format'),
  }),
  body: z.object({
    status: z.enum(MATERIAL_STATUSES),
  }),
});

export const adjustMaterialTotalSchema = z.object({
  params: z.object({
    id: z.string().uuid('Invalid material ID format'),
  }),
  body: z.object({
    total_quantity: quantity,
  }),
});

export const listMaterialsSchema = z.object({
  query: z.object({
    status: z.enum(MATERIAL_STATUSES).optional(),
  }),
});

export const getMaterialSchema = uuidParam('material');
export const deleteMaterialSchema = uuidParam('material');
