/**
 * Material domain types
 */

export const MATERIAL_STATUSES = ['available', 'unavailable'] as const;

export type MaterialStatus = (typeof MATERIAL_STATUSES)[number];

export type StockStatus = 'sufficient' | 'low' | 'insufficient';

export interface Material {
  id: string;
  name: string;
  category: string;
  unit: string;
  description: string;
  totalQuantity: number;
  availableQuantity: number;
  status: MaterialStatus;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

// Database row type (snake_case from PostgreSQL)
export interface MaterialRow {
  id: string;
  name: string;
  category: string;
  unit: string;
  description: string;
  total_quantity: number;
  available_quantity: number;
  status: string;
  version: number;
  created_at: string;
  updated_at: string;
}

// Create material input
export interface CreateMaterialInput {
  name: string;
  category: string;
  unit: string;
  description: string;
  totalQuantity: number;
  status?: MaterialStatus;
}

// Descriptive fields an admin may edit; quantities and status have their own requests
export interface UpdateMaterialRequest {
  name?: string;
  category?: string;
  unit?: string;
  description?: string;
}
