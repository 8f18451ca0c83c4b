import { InMemoryReservationStore } from '../../src/repositories/memory.store';
import type { Actor } from '../../src/types/actor.types';
import type { Application } from '../../src/types/application.types';
import type { Material } from '../../src/types/material.types';
import type { Venue } from '../../src/types/venue.types';
import type { Clock } from '../../src/utils/clock';

/**
 * Shared test data
 */

export const NOW = new Date('2030-01-01T08:00:00.000Z');
export const fixedClock: Clock = () => new Date(NOW);

// Hour `hour` of 2030-03-01 (UTC), well after NOW
export const at = (hour: number, minute = 0): Date =>
  new Date(Date.UTC(2030, 2, 1, hour, minute));

export const VENUE_ID = '11111111-1111-4111-8111-111111111111';
export const OTHER_VENUE_ID = '22222222-2222-4222-8222-222222222222';
export const MATERIAL_ID = '33333333-3333-4333-8333-333333333333';
export const OTHER_MATERIAL_ID = '44444444-4444-4444-8444-444444444444';
export const MISSING_ID = '99999999-9999-4999-8999-999999999999';

export const member: Actor = { id: 'member-1', role: 'member' };
export const otherMember: Actor = { id: 'member-2', role: 'member' };
export const reviewer: Actor = { id: 'reviewer-1', role: 'reviewer' };
export const admin: Actor = { id: 'admin-1', role: 'admin' };
export const superAdmin: Actor = { id: 'root-1', role: 'super_admin' };

export function buildVenue(overrides: Partial<Venue> = {}): Venue {
  return {
    id: VENUE_ID,
    name: 'Main Hall',
    location: 'Building A',
    capacity: 200,
    description: '',
    equipment: ['projector'],
    status: 'available',
    version: 1,
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

export function buildMaterial(overrides: Partial<Material> = {}): Material {
  return {
    id: MATERIAL_ID,
    name: 'Folding chair',
    category: 'furniture',
    unit: 'pcs',
    description: '',
    totalQuantity: 5,
    availableQuantity: 5,
    status: 'available',
    version: 1,
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

export function buildApplication(overrides: Partial<Application> = {}): Application {
  return {
    id: 'app-1',
    requesterId: member.id,
    activityName: 'Club meeting',
    activityDescription: '',
    venueId: VENUE_ID,
    startTime: at(10),
    endTime: at(12),
    lineItems: [{ materialId: MATERIAL_ID, quantity: 1 }],
    status: 'pending_reviewer',
    version: 1,
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

/**
 * Store with two venues and two materials:
 * chairs (5 of 5) and tables (10 of 10)
 */
export async function seedStore(): Promise<InMemoryReservationStore> {
  const store = new InMemoryReservationStore();

  await store.insertVenue(buildVenue());
  await store.insertVenue(buildVenue({ id: OTHER_VENUE_ID, name: 'Studio B', capacity: 30 }));
  await store.insertMaterial(buildMaterial());
  await store.insertMaterial(
    buildMaterial({
      id: OTHER_MATERIAL_ID,
      name: 'Table',
      totalQuantity: 10,
      availableQuantity: 10,
    })
  );

  return store;
}

export function sequentialIds(prefix = 'app'): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}
