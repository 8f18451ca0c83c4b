/**
 * Venue domain types
 */

export const VENUE_STATUSES = ['available', 'maintenance'] as const;

export type VenueStatus = (typeof VENUE_STATUSES)[number];

export interface Venue {
  id: string;
  name: string;
  location: string;
  capacity: number;
  description: string;
  equipment: string[];
  status: VenueStatus;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

// Database row type (snake_case from PostgreSQL)
export interface VenueRow {
  id: string;
  name: string;
  location: string;
  capacity: number;
  description: string;
  equipment: string[] | null;
  status: string;
  version: number;
  created_at: string;
  updated_at: string;
}

// Create venue input
export interface CreateVenueInput {
  name: string;
  location: string;
  capacity: number;
  description: string;
  equipment?: string[];
  status?: VenueStatus;
}

// Descriptive fields an admin may edit; status has its own request
export interface UpdateVenueRequest {
  name?: string;
  location?: string;
  capacity?: number;
  description?: string;
  equipment?: string[];
}

export interface VenueSummary {
  id: string;
  name: string;
  location: string;
  capacity: number;
  status: VenueStatus;
}
