import { SupabaseClient } from '@supabase/supabase-js';
import pRetry from 'p-retry';
import {
  ACTIVE_STATUSES,
  APPLICATION_STATUSES,
  Application,
  ApplicationFilter,
  ApplicationRow,
} from '../types/application.types';
import { MATERIAL_STATUSES, Material, MaterialRow, MaterialStatus } from '../types/material.types';
import { VENUE_STATUSES, Venue, VenueRow, VenueStatus } from '../types/venue.types';
import {
  AppError,
  duplicateMaterialName,
  ErrorCode,
  StoreConflictError,
} from '../types/error.types';
import { parseEnum } from '../utils/enum';
import { componentLogger } from '../config/logger';
import type {
  LockScope,
  ReservationStore,
  StoreTransaction,
  TimeWindow,
} from './store.types';

const logger = componentLogger('store');

// PostgREST code for "no rows returned" on .single()
const NOT_FOUND = 'PGRST116';
// SQLSTATE serialization_failure, raised by commit_reservation_changes on a stale version
const SERIALIZATION_FAILURE = '40001';
const UNIQUE_VIOLATION = '23505';
const MATERIAL_NAME_CONSTRAINT = 'materials_name_unique';

const APPLICATION_SELECT = '*, application_line_items(*)';

export interface SupabaseStoreOptions {
  commitRetries: number;
}

interface DatabaseError {
  code: string;
  message: string;
  details: string;
}

/**
 * DUPLICATE_NAME for a write that hit the unique index on materials.name
 */
const materialNameClash = (error: DatabaseError): AppError | null => {
  if (error.code !== UNIQUE_VIOLATION || !error.message.includes(MATERIAL_NAME_CONSTRAINT)) {
    return null;
  }
  // details read: Key (name)=(Folding chair) already exists.
  const name = /\(name\)=\((.*)\)/.exec(error.details)?.[1] ?? '';
  return duplicateMaterialName(name);
};

/**
 * Row mapping shared by the store and its transactions
 */
const mapToVenue = (row: VenueRow): Venue => ({
  id: row.id,
  name: row.name,
  location: row.location,
  capacity: row.capacity,
  description: row.description,
  equipment: row.equipment ?? [],
  status: parseEnum(VENUE_STATUSES, row.status, 'venue status'),
  version: row.version,
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
});

const mapToMaterial = (row: MaterialRow): Material => ({
  id: row.id,
  name: row.name,
  category: row.category,
  unit: row.unit,
  description: row.description,
  totalQuantity: row.total_quantity,
  availableQuantity: row.available_quantity,
  status: parseEnum(MATERIAL_STATUSES, row.status, 'material status'),
  version: row.version,
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
});

const mapToApplication = (row: ApplicationRow): Application => ({
  id: row.id,
  requesterId: row.requester_id,
  activityName: row.activity_name,
  activityDescription: row.activity_description,
  venueId: row.venue_id,
  startTime: new Date(row.start_time),
  endTime: new Date(row.end_time),
  lineItems: [...(row.application_line_items ?? [])]
    .sort((a, b) => a.position - b.position)
    .map((item) => ({ materialId: item.material_id, quantity: item.quantity })),
  status: parseEnum(APPLICATION_STATUSES, row.status, 'application status'),
  version: row.version,
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
  ...(row.reviewer_id && { reviewerId: row.reviewer_id }),
  ...(row.rejection_reason && { rejectionReason: row.rejection_reason }),
  ...(row.reviewed_at && { reviewedAt: new Date(row.reviewed_at) }),
});

const venueToRow = (venue: Venue) => ({
  id: venue.id,
  name: venue.name,
  location: venue.location,
  capacity: venue.capacity,
  description: venue.description,
  equipment: venue.equipment,
  status: venue.status,
  updated_at: venue.updatedAt.toISOString(),
});

const materialToRow = (material: Material) => ({
  id: material.id,
  name: material.name,
  category: material.category,
  unit: material.unit,
  description: material.description,
  total_quantity: material.totalQuantity,
  available_quantity: material.availableQuantity,
  status: material.status,
  updated_at: material.updatedAt.toISOString(),
});

const applicationToRow = (application: Application) => ({
  id: application.id,
  requester_id: application.requesterId,
  activity_name: application.activityName,
  activity_description: application.activityDescription,
  venue_id: application.venueId,
  start_time: application.startTime.toISOString(),
  end_time: application.endTime.toISOString(),
  status: application.status,
  reviewer_id: application.reviewerId ?? null,
  rejection_reason: application.rejectionReason ?? null,
  created_at: application.createdAt.toISOString(),
  reviewed_at: application.reviewedAt?.toISOString() ?? null,
  updated_at: application.updatedAt.toISOString(),
  line_items: application.lineItems.map((item, position) => ({
    position,
    material_id: item.materialId,
    quantity: item.quantity,
  })),
});

/**
 * Read helpers over the Supabase client
 */
class SupabaseReader {
  constructor(protected client: SupabaseClient) {}

  async fetchVenue(id: string): Promise<Venue | null> {
    const { data, error } = await this.client.from('venues').select('*').eq('id', id).single();

    if (error) {
      if (error.code === NOT_FOUND) return null;
      logger.error('Failed to find venue', { id, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to find venue: ${error.message}`, 500);
    }

    return data ? mapToVenue(data) : null;
  }

  async fetchMaterial(id: string): Promise<Material | null> {
    const { data, error } = await this.client.from('materials').select('*').eq('id', id).single();

    if (error) {
      if (error.code === NOT_FOUND) return null;
      logger.error('Failed to find material', { id, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to find material: ${error.message}`, 500);
    }

    return data ? mapToMaterial(data) : null;
  }

  async fetchApplication(id: string): Promise<Application | null> {
    const { data, error } = await this.client
      .from('applications')
      .select(APPLICATION_SELECT)
      .eq('id', id)
      .single();

    if (error) {
      if (error.code === NOT_FOUND) return null;
      logger.error('Failed to find application', { id, error: error.message });
      throw new AppError(
        ErrorCode.DATABASE_ERROR,
        `Failed to find application: ${error.message}`,
        500
      );
    }

    return data ? mapToApplication(data) : null;
  }

  /**
   * Active applications on a venue whose interval intersects the window
   */
  async fetchActiveForVenue(venueId: string, window: TimeWindow): Promise<Application[]> {
    const { data, error } = await this.client
      .from('applications')
      .select(APPLICATION_SELECT)
      .eq('venue_id', venueId)
      .in('status', [...ACTIVE_STATUSES])
      .lt('start_time', window.endTime.toISOString())
      .gt('end_time', window.startTime.toISOString());

    if (error) {
      logger.error('Failed to list active applications', { venueId, error: error.message });
      throw new AppError(
        ErrorCode.DATABASE_ERROR,
        `Failed to list active applications: ${error.message}`,
        500
      );
    }

    return (data ?? []).map(mapToApplication);
  }

  async fetchApplicationsUsingVenue(venueId: string): Promise<Application[]> {
    const { data, error } = await this.client
      .from('applications')
      .select(APPLICATION_SELECT)
      .eq('venue_id', venueId);

    if (error) {
      logger.error('Failed to list venue applications', { venueId, error: error.message });
      throw new AppError(
        ErrorCode.DATABASE_ERROR,
        `Failed to list venue applications: ${error.message}`,
        500
      );
    }

    return (data ?? []).map(mapToApplication);
  }

  async fetchApplicationsUsingMaterial(materialId: string): Promise<Application[]> {
    const { data: items, error: itemsError } = await this.client
      .from('application_line_items')
      .select('application_id')
      .eq('material_id', materialId);

    if (itemsError) {
      logger.error('Failed to list material line items', { materialId, error: itemsError.message });
      throw new AppError(
        ErrorCode.DATABASE_ERROR,
        `Failed to list material applications: ${itemsError.message}`,
        500
      );
    }

    const ids = [...new Set((items ?? []).map((item: { application_id: string }) => item.application_id))];
    if (ids.length === 0) return [];

    const { data, error } = await this.client
      .from('applications')
      .select(APPLICATION_SELECT)
      .in('id', ids);

    if (error) {
      logger.error('Failed to list material applications', { materialId, error: error.message });
      throw new AppError(
        ErrorCode.DATABASE_ERROR,
        `Failed to list material applications: ${error.message}`,
        500
      );
    }

    return (data ?? []).map(mapToApplication);
  }
}

interface VersionedWrite<T> {
  expectedVersion: number;
  row: T | null;
}

/**
 * Optimistic unit of work.
 *
 * Every venue, material and application read here is remembered with its
 * version. `commit` hands all writes plus those versions to
 * commit_reservation_changes(), which applies them in one database
 * transaction or raises serialization_failure.
 */
class SupabaseTransaction extends SupabaseReader implements StoreTransaction {
  private venues = new Map<string, VersionedWrite<Venue>>();
  private materials = new Map<string, VersionedWrite<Material>>();
  private applications = new Map<string, VersionedWrite<Application>>();
  private inserted = new Map<string, Application>();
  // id -> version the row had when it was deleted
  private deletedVenues = new Map<string, number>();
  private deletedMaterials = new Map<string, number>();

  async getVenue(id: string): Promise<Venue | null> {
    if (this.deletedVenues.has(id)) return null;
    const tracked = this.venues.get(id);
    if (tracked?.row) return structuredClone(tracked.row);

    const venue = await this.fetchVenue(id);
    if (venue && !tracked) {
      this.venues.set(id, { expectedVersion: venue.version, row: null });
    }
    return venue;
  }

  async getMaterial(id: string): Promise<Material | null> {
    if (this.deletedMaterials.has(id)) return null;
    const tracked = this.materials.get(id);
    if (tracked?.row) return structuredClone(tracked.row);

    const material = await this.fetchMaterial(id);
    if (material && !tracked) {
      this.materials.set(id, { expectedVersion: material.version, row: null });
    }
    return material;
  }

  async getApplication(id: string): Promise<Application | null> {
    const staged = this.inserted.get(id) ?? this.applications.get(id)?.row;
    if (staged) return structuredClone(staged);

    const application = await this.fetchApplication(id);
    if (application && !this.applications.has(id)) {
      this.applications.set(id, { expectedVersion: application.version, row: null });
    }
    return application;
  }

  async listActiveApplicationsForVenue(venueId: string, window: TimeWindow): Promise<Application[]> {
    const committed = await this.fetchActiveForVenue(venueId, window);
    const staged = [...this.inserted.values()].filter((app) => app.venueId === venueId);
    return [...committed, ...staged.map((app) => structuredClone(app))];
  }

  async listApplicationsUsingVenue(venueId: string): Promise<Application[]> {
    const committed = await this.fetchApplicationsUsingVenue(venueId);
    const staged = [...this.inserted.values()].filter((app) => app.venueId === venueId);
    return [...committed, ...staged.map((app) => structuredClone(app))];
  }

  async listApplicationsUsingMaterial(materialId: string): Promise<Application[]> {
    const committed = await this.fetchApplicationsUsingMaterial(materialId);
    const staged = [...this.inserted.values()].filter((app) =>
      app.lineItems.some((item) => item.materialId === materialId)
    );
    return [...committed, ...staged.map((app) => structuredClone(app))];
  }

  async saveVenue(venue: Venue): Promise<void> {
    const expectedVersion = this.venues.get(venue.id)?.expectedVersion ?? venue.version;
    this.venues.set(venue.id, { expectedVersion, row: structuredClone(venue) });
  }

  async saveMaterial(material: Material): Promise<void> {
    const expectedVersion = this.materials.get(material.id)?.expectedVersion ?? material.version;
    this.materials.set(material.id, { expectedVersion, row: structuredClone(material) });
  }

  async insertApplication(application: Application): Promise<void> {
    this.inserted.set(application.id, structuredClone(application));
  }

  async saveApplication(application: Application): Promise<void> {
    if (this.inserted.has(application.id)) {
      this.inserted.set(application.id, structuredClone(application));
      return;
    }
    const expectedVersion =
      this.applications.get(application.id)?.expectedVersion ?? application.version;
    this.applications.set(application.id, { expectedVersion, row: structuredClone(application) });
  }

  async deleteVenue(venue: Venue): Promise<void> {
    const expectedVersion = this.venues.get(venue.id)?.expectedVersion ?? venue.version;
    this.venues.delete(venue.id);
    this.deletedVenues.set(venue.id, expectedVersion);
  }

  async deleteMaterial(material: Material): Promise<void> {
    const expectedVersion = this.materials.get(material.id)?.expectedVersion ?? material.version;
    this.materials.delete(material.id);
    this.deletedMaterials.set(material.id, expectedVersion);
  }

  async commit(): Promise<void> {
    const payload = {
      p_venues: [...this.venues.entries()].map(([id, write]) => ({
        id,
        expected_version: write.expectedVersion,
        changes: write.row ? venueToRow(write.row) : null,
      })),
      p_materials: [...this.materials.entries()]
        .filter(([, write]) => write.row !== null)
        .map(([id, write]) => ({
          id,
          expected_version: write.expectedVersion,
          changes: write.row ? materialToRow(write.row) : null,
        })),
      p_new_applications: [...this.inserted.values()].map(applicationToRow),
      p_updated_applications: [...this.applications.entries()]
        .filter(([, write]) => write.row !== null)
        .map(([id, write]) => ({
          id,
          expected_version: write.expectedVersion,
          changes: write.row ? applicationToRow(write.row) : null,
        })),
      p_deleted_venues: [...this.deletedVenues.entries()].map(([id, expectedVersion]) => ({
        id,
        expected_version: expectedVersion,
      })),
      p_deleted_materials: [...this.deletedMaterials.entries()].map(([id, expectedVersion]) => ({
        id,
        expected_version: expectedVersion,
      })),
    };

    const { error } = await this.client.rpc('commit_reservation_changes', payload);

    if (error) {
      if (error.code === SERIALIZATION_FAILURE) {
        throw new StoreConflictError(error.message);
      }
      const clash = materialNameClash(error);
      if (clash) throw clash;

      logger.error('Failed to commit reservation changes', {
        error: error.message,
        code: error.code,
        details: error.details,
        hint: error.hint,
      });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to commit changes: ${error.message}`, 500);
    }
  }
}

/**
 * Supabase (PostgreSQL) reservation store
 *
 * Concurrency approach:
 * - Reads run through PostgREST as usual
 * - Writes are staged and committed by one PostgreSQL function that checks
 *   the version of every row the unit of work read (venues included, so a
 *   concurrent booking on the same venue invalidates the conflict check)
 * - A stale version raises serialization_failure; the whole unit of work is
 *   re-run against fresh rows with p-retry
 */
export class SupabaseReservationStore extends SupabaseReader implements ReservationStore {
  readonly driver = 'supabase' as const;

  constructor(
    client: SupabaseClient,
    private options: SupabaseStoreOptions
  ) {
    super(client);
  }

  findVenueById(id: string): Promise<Venue | null> {
    return this.fetchVenue(id);
  }

  async listVenues(status?: VenueStatus): Promise<Venue[]> {
    let query = this.client.from('venues').select('*').order('name');
    if (status) query = query.eq('status', status);

    const { data, error } = await query;

    if (error) {
      logger.error('Failed to list venues', { error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to list venues: ${error.message}`, 500);
    }

    return (data ?? []).map(mapToVenue);
  }

  async insertVenue(venue: Venue): Promise<Venue> {
    logger.debug('Creating venue', { name: venue.name });

    const { data, error } = await this.client
      .from('venues')
      .insert({
        ...venueToRow(venue),
        version: venue.version,
        created_at: venue.createdAt.toISOString(),
      })
      .select()
      .single();

    if (error) {
      logger.error('Failed to create venue', { error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to create venue: ${error.message}`, 500);
    }

    return mapToVenue(data);
  }

  findMaterialById(id: string): Promise<Material | null> {
    return this.fetchMaterial(id);
  }

  async findMaterialByName(name: string): Promise<Material | null> {
    const { data, error } = await this.client
      .from('materials')
      .select('*')
      .eq('name', name)
      .maybeSingle();

    if (error) {
      logger.error('Failed to find material by name', { name, error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to find material: ${error.message}`, 500);
    }

    return data ? mapToMaterial(data) : null;
  }

  async listMaterials(status?: MaterialStatus): Promise<Material[]> {
    let query = this.client.from('materials').select('*').order('name');
    if (status) query = query.eq('status', status);

    const { data, error } = await query;

    if (error) {
      logger.error('Failed to list materials', { error: error.message });
      throw new AppError(ErrorCode.DATABASE_ERROR, `Failed to list materials: ${error.message}`, 500);
    }

    return (data ?? []).map(mapToMaterial);
  }

  async insertMaterial(material: Material): Promise<Material> {
    logger.debug('Creating material', { name: material.name });

    const { data, error } = await this.client
      .from('materials')
      .insert({
        ...materialToRow(material),
        version: material.version,
        created_at: material.createdAt.toISOString(),
      })
      .select()
      .single();

    if (error) {
      const clash = materialNameClash(error);
      if (clash) throw clash;

      logger.error('Failed to create material', { error: error.message });
      throw new AppError(
        ErrorCode.DATABASE_ERROR,
        `Failed to create material: ${error.message}`,
        500
      );
    }

    return mapToMaterial(data);
  }

  findApplicationById(id: string): Promise<Application | null> {
    return this.fetchApplication(id);
  }

  async listApplications(filter: ApplicationFilter): Promise<Application[]> {
    let query = this.client
      .from('applications')
      .select(APPLICATION_SELECT)
      .order('created_at', { ascending: false });

    if (filter.requesterId) query = query.eq('requester_id', filter.requesterId);
    if (filter.venueId) query = query.eq('venue_id', filter.venueId);
    if (filter.statuses) query = query.in('status', [...filter.statuses]);

    const { data, error } = await query;

    if (error) {
      logger.error('Failed to list applications', { filter, error: error.message });
      throw new AppError(
        ErrorCode.DATABASE_ERROR,
        `Failed to list applications: ${error.message}`,
        500
      );
    }

    return (data ?? []).map(mapToApplication);
  }

  listActiveApplicationsForVenue(venueId: string, window: TimeWindow): Promise<Application[]> {
    return this.fetchActiveForVenue(venueId, window);
  }

  async runInTransaction<T>(
    scope: LockScope,
    work: (tx: StoreTransaction) => Promise<T>
  ): Promise<T> {
    try {
      return await pRetry(
        async () => {
          const tx = new SupabaseTransaction(this.client);
          const result = await work(tx);
          await tx.commit();
          return result;
        },
        {
          retries: this.options.commitRetries,
          minTimeout: 25,
          maxTimeout: 250,
          randomize: true,
          onFailedAttempt: (error) => {
            // Business errors and store failures are final; only version races retry
            if (!(error instanceof StoreConflictError)) {
              throw error;
            }
            logger.warn('Commit lost a version check, retrying', {
              scope,
              attempt: error.attemptNumber,
              retriesLeft: error.retriesLeft,
            });
          },
        }
      );
    } catch (error) {
      if (error instanceof StoreConflictError) {
        logger.error('Commit retries exhausted', { scope, error: error.message });
        throw new AppError(
          ErrorCode.STORE_CONTENTION,
          'The resource is busy, please retry the request',
          503
        );
      }
      throw error;
    }
  }

  async ping(): Promise<boolean> {
    const { error } = await this.client.from('venues').select('id').limit(1);

    if (error) {
      logger.error('Database connection test failed', { error: error.message });
      return false;
    }

    return true;
  }
}
