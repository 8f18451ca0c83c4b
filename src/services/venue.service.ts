import { randomUUID } from 'crypto';
import type { ReservationStore } from '../repositories/store.types';
import type { Actor } from '../types/actor.types';
import type { CreateVenueInput, UpdateVenueRequest, Venue, VenueStatus } from '../types/venue.types';
import { AppError, ErrorCode } from '../types/error.types';
import { assertUnreferenced } from './catalog-references';
import { assertAdmin } from '../utils/authorization';
import { systemClock, Clock } from '../utils/clock';
import { componentLogger } from '../config/logger';

const logger = componentLogger('venues');

const assertCapacity = (capacity: number): void => {
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new AppError(ErrorCode.VALIDATION_ERROR, 'Capacity must be a positive integer', 400, {
      capacity,
    });
  }
};

/**
 * Venue Service
 *
 * Venue catalog maintenance. Status and descriptive edits go through
 * separate requests and run inside a store transaction on the venue, so
 * they serialize with bookings being placed on it.
 */
export class VenueService {
  constructor(
    private store: ReservationStore,
    private clock: Clock = systemClock
  ) {}

  async createVenue(actor: Actor, input: CreateVenueInput): Promise<Venue> {
    assertAdmin(actor, 'create venues');
    assertCapacity(input.capacity);
    logger.info('Creating venue', { name: input.name, actorId: actor.id });

    const now = this.clock();
    const venue = await this.store.insertVenue({
      id: randomUUID(),
      name: input.name.trim(),
      location: input.location.trim(),
      capacity: input.capacity,
      description: input.description,
      equipment: input.equipment ?? [],
      status: input.status ?? 'available',
      version: 1,
      createdAt: now,
      updatedAt: now,
    });

    logger.info('Venue created successfully', { venueId: venue.id });
    return venue;
  }

  async getVenue(id: string): Promise<Venue> {
    logger.debug('Getting venue', { id });

    const venue = await this.store.findVenueById(id);

    if (!venue) {
      throw new AppError(ErrorCode.VENUE_NOT_FOUND, `Venue with ID ${id} not found`, 404);
    }

    return venue;
  }

  listVenues(status?: VenueStatus): Promise<Venue[]> {
    return this.store.listVenues(status);
  }

  async updateVenueDetails(actor: Actor, id: string, request: UpdateVenueRequest): Promise<Venue> {
    assertAdmin(actor, 'edit venues');
    if (request.capacity !== undefined) assertCapacity(request.capacity);

    await this.store.runInTransaction({ venueIds: [id] }, async (tx) => {
      const venue = await tx.getVenue(id);
      if (!venue) {
        throw new AppError(ErrorCode.VENUE_NOT_FOUND, `Venue with ID ${id} not found`, 404);
      }

      await tx.saveVenue({
        ...venue,
        ...(request.name !== undefined && { name: request.name.trim() }),
        ...(request.location !== undefined && { location: request.location.trim() }),
        ...(request.capacity !== undefined && { capacity: request.capacity }),
        ...(request.description !== undefined && { description: request.description }),
        ...(request.equipment !== undefined && { equipment: [...request.equipment] }),
        updatedAt: this.clock(),
      });
    });

    logger.info('Venue updated', { venueId: id, fields: Object.keys(request) });
    return this.getVenue(id);
  }

  /**
   * Put a venue into or out of maintenance. Existing bookings are kept;
   * a venue in maintenance only refuses new ones and approvals.
   */
  async setVenueStatus(actor: Actor, id: string, status: VenueStatus): Promise<Venue> {
    assertAdmin(actor, 'change venue status');

    await this.store.runInTransaction({ venueIds: [id] }, async (tx) => {
      const venue = await tx.getVenue(id);
      if (!venue) {
        throw new AppError(ErrorCode.VENUE_NOT_FOUND, `Venue with ID ${id} not found`, 404);
      }
      if (venue.status === status) return;

      await tx.saveVenue({ ...venue, status, updatedAt: this.clock() });
    });

    logger.info('Venue status changed', { venueId: id, status });
    return this.getVenue(id);
  }

  /**
   * Remove a venue no application has ever booked. The check and the delete
   * share the venue's transaction, so a booking cannot slip in between.
   */
  async deleteVenue(actor: Actor, id: string): Promise<void> {
    assertAdmin(actor, 'delete venues');

    await this.store.runInTransaction({ venueIds: [id] }, async (tx) => {
      const venue = await tx.getVenue(id);
      if (!venue) {
        throw new AppError(ErrorCode.VENUE_NOT_FOUND, `Venue with ID ${id} not found`, 404);
      }

      assertUnreferenced('venue', id, await tx.listApplicationsUsingVenue(id));
      await tx.deleteVenue(venue);
    });

    logger.info('Venue deleted', { venueId: id, actorId: actor.id });
  }
}
