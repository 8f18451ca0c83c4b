import type { Application, ApplicationFilter } from '../types/application.types';
import type { Material, MaterialStatus } from '../types/material.types';
import type { Venue, VenueStatus } from '../types/venue.types';

/**
 * Rows a unit of work intends to touch.
 *
 * The in-process store locks exactly these keys; the Supabase store guards
 * whatever the transaction reads and uses the scope for logging only.
 */
export interface LockScope {
  venueIds?: readonly string[];
  materialIds?: readonly string[];
  applicationIds?: readonly string[];
}

export interface TimeWindow {
  startTime: Date;
  endTime: Date;
}

/**
 * Read access to active applications on a venue.
 *
 * Implementations may pre-filter by the window, but the Conflict Detector
 * applies the overlap rule itself.
 */
export interface ActiveApplicationReader {
  listActiveApplicationsForVenue(venueId: string, window: TimeWindow): Promise<Application[]>;
}

/**
 * Reads and writes inside one serializable unit of work.
 *
 * Writes are only visible to other callers once the surrounding
 * `runInTransaction` resolves; a thrown error discards all of them.
 */
export interface StoreTransaction extends ActiveApplicationReader {
  getVenue(id: string): Promise<Venue | null>;
  getMaterial(id: string): Promise<Material | null>;
  getApplication(id: string): Promise<Application | null>;

  // Applications in any status that reference the row
  listApplicationsUsingVenue(venueId: string): Promise<Application[]>;
  listApplicationsUsingMaterial(materialId: string): Promise<Application[]>;

  saveVenue(venue: Venue): Promise<void>;
  saveMaterial(material: Material): Promise<void>;
  insertApplication(application: Application): Promise<void>;
  saveApplication(application: Application): Promise<void>;

  // Removes a row read earlier in this unit of work; its version is checked on commit
  deleteVenue(venue: Venue): Promise<void>;
  deleteMaterial(material: Material): Promise<void>;
}

/**
 * Persistence store for venues, materials and applications
 *
 * Material names are unique; a write that would duplicate one fails with
 * DUPLICATE_NAME.
 */
export interface ReservationStore extends ActiveApplicationReader {
  readonly driver: 'memory' | 'supabase';

  findVenueById(id: string): Promise<Venue | null>;
  listVenues(status?: VenueStatus): Promise<Venue[]>;
  insertVenue(venue: Venue): Promise<Venue>;

  findMaterialById(id: string): Promise<Material | null>;
  findMaterialByName(name: string): Promise<Material | null>;
  listMaterials(status?: MaterialStatus): Promise<Material[]>;
  insertMaterial(material: Material): Promise<Material>;

  findApplicationById(id: string): Promise<Application | null>;
  listApplications(filter: ApplicationFilter): Promise<Application[]>;

  runInTransaction<T>(scope: LockScope, work: (tx: StoreTransaction) => Promise<T>): Promise<T>;

  ping(): Promise<boolean>;
}
