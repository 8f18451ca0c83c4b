import type { Application, ApplicationFilter } from '../types/application.types';
import { isActiveStatus } from '../types/application.types';
import type { Material, MaterialStatus } from '../types/material.types';
import type { Venue, VenueStatus } from '../types/venue.types';
import { duplicateMaterialName, StoreConflictError } from '../types/error.types';
import { KeyedLock } from '../utils/keyed-lock';
import { componentLogger } from '../config/logger';
import type {
  LockScope,
  ReservationStore,
  StoreTransaction,
  TimeWindow,
} from './store.types';

const logger = componentLogger('store');

interface Tables {
  venues: Map<string, Venue>;
  materials: Map<string, Material>;
  applications: Map<string, Application>;
}

const clone = <T>(value: T): T => structuredClone(value);

const byNewestFirst = (a: Application, b: Application): number =>
  b.createdAt.getTime() - a.createdAt.getTime();

const byName = (a: { name: string }, b: { name: string }): number => a.name.localeCompare(b.name);

// Same rule as the unique index on materials.name
const assertUniqueMaterialName = (materials: Iterable<Material>, candidate: Material): void => {
  for (const other of materials) {
    if (other.id !== candidate.id && other.name === candidate.name) {
      throw duplicateMaterialName(candidate.name);
    }
  }
};

/**
 * Staged unit of work over the in-process tables.
 *
 * Reads see this transaction's own writes; nothing reaches the shared
 * tables until `commit`.
 */
class InMemoryTransaction implements StoreTransaction {
  private venues = new Map<string, Venue>();
  private materials = new Map<string, Material>();
  private inserted = new Map<string, Application>();
  private updated = new Map<string, Application>();
  // id -> version the row had when it was deleted
  private deletedVenues = new Map<string, number>();
  private deletedMaterials = new Map<string, number>();

  constructor(private tables: Tables) {}

  async getVenue(id: string): Promise<Venue | null> {
    if (this.deletedVenues.has(id)) return null;
    const row = this.venues.get(id) ?? this.tables.venues.get(id);
    return row ? clone(row) : null;
  }

  async getMaterial(id: string): Promise<Material | null> {
    if (this.deletedMaterials.has(id)) return null;
    const row = this.materials.get(id) ?? this.tables.materials.get(id);
    return row ? clone(row) : null;
  }

  async getApplication(id: string): Promise<Application | null> {
    const row = this.updated.get(id) ?? this.inserted.get(id) ?? this.tables.applications.get(id);
    return row ? clone(row) : null;
  }

  async listActiveApplicationsForVenue(venueId: string, _window: TimeWindow): Promise<Application[]> {
    return this.applications()
      .filter((app) => app.venueId === venueId && isActiveStatus(app.status))
      .map(clone);
  }

  async listApplicationsUsingVenue(venueId: string): Promise<Application[]> {
    return this.applications()
      .filter((app) => app.venueId === venueId)
      .map(clone);
  }

  async listApplicationsUsingMaterial(materialId: string): Promise<Application[]> {
    return this.applications()
      .filter((app) => app.lineItems.some((item) => item.materialId === materialId))
      .map(clone);
  }

  async saveVenue(venue: Venue): Promise<void> {
    this.venues.set(venue.id, clone(venue));
  }

  async saveMaterial(material: Material): Promise<void> {
    this.materials.set(material.id, clone(material));
  }

  async insertApplication(application: Application): Promise<void> {
    this.inserted.set(application.id, clone(application));
  }

  async saveApplication(application: Application): Promise<void> {
    if (this.inserted.has(application.id)) {
      this.inserted.set(application.id, clone(application));
      return;
    }
    this.updated.set(application.id, clone(application));
  }

  async deleteVenue(venue: Venue): Promise<void> {
    this.venues.delete(venue.id);
    this.deletedVenues.set(venue.id, venue.version);
  }

  async deleteMaterial(material: Material): Promise<void> {
    this.materials.delete(material.id);
    this.deletedMaterials.set(material.id, material.version);
  }

  /**
   * Apply staged writes, bumping each updated row's version.
   * Version checks only fail if a row was written outside the lock scope.
   */
  commit(): void {
    for (const row of this.venues.values()) {
      this.assertVersion(this.tables.venues, row.id, row.version, 'venue');
    }
    for (const row of this.materials.values()) {
      this.assertVersion(this.tables.materials, row.id, row.version, 'material');
    }
    for (const row of this.updated.values()) {
      this.assertVersion(this.tables.applications, row.id, row.version, 'application');
    }
    for (const [id, version] of this.deletedVenues) {
      this.assertVersion(this.tables.venues, id, version, 'venue');
    }
    for (const [id, version] of this.deletedMaterials) {
      this.assertVersion(this.tables.materials, id, version, 'material');
    }

    if (this.materials.size > 0) {
      const after = new Map(this.tables.materials);
      for (const material of this.materials.values()) after.set(material.id, material);
      for (const id of this.deletedMaterials.keys()) after.delete(id);
      for (const material of this.materials.values()) {
        assertUniqueMaterialName(after.values(), material);
      }
    }

    for (const venue of this.venues.values()) {
      this.tables.venues.set(venue.id, { ...venue, version: venue.version + 1 });
    }
    for (const material of this.materials.values()) {
      this.tables.materials.set(material.id, { ...material, version: material.version + 1 });
    }
    for (const application of this.inserted.values()) {
      this.tables.applications.set(application.id, application);
    }
    for (const application of this.updated.values()) {
      this.tables.applications.set(application.id, {
        ...application,
        version: application.version + 1,
      });
    }
    for (const id of this.deletedVenues.keys()) {
      this.tables.venues.delete(id);
    }
    for (const id of this.deletedMaterials.keys()) {
      this.tables.materials.delete(id);
    }
  }

  // Committed applications overlaid with this transaction's writes
  private applications(): Application[] {
    const merged = new Map(this.tables.applications);
    for (const [id, app] of [...this.inserted, ...this.updated]) {
      merged.set(id, app);
    }
    return [...merged.values()];
  }

  private assertVersion<T extends { version: number }>(
    table: Map<string, T>,
    id: string,
    version: number,
    label: string
  ): void {
    const current = table.get(id);
    if (!current || current.version !== version) {
      throw new StoreConflictError(`Stale ${label} ${id}`);
    }
  }
}

/**
 * In-process reservation store
 *
 * Serializes units of work with a keyed lock per venue, material and
 * application. Suitable for a single-process deployment and for tests.
 */
export class InMemoryReservationStore implements ReservationStore {
  readonly driver = 'memory' as const;

  private tables: Tables = {
    venues: new Map(),
    materials: new Map(),
    applications: new Map(),
  };

  private locks = new KeyedLock();

  async findVenueById(id: string): Promise<Venue | null> {
    const row = this.tables.venues.get(id);
    return row ? clone(row) : null;
  }

  async listVenues(status?: VenueStatus): Promise<Venue[]> {
    return [...this.tables.venues.values()]
      .filter((venue) => !status || venue.status === status)
      .sort(byName)
      .map(clone);
  }

  async insertVenue(venue: Venue): Promise<Venue> {
    logger.debug('Inserting venue', { id: venue.id, name: venue.name });
    this.tables.venues.set(venue.id, clone(venue));
    return clone(venue);
  }

  async findMaterialById(id: string): Promise<Material | null> {
    const row = this.tables.materials.get(id);
    return row ? clone(row) : null;
  }

  async findMaterialByName(name: string): Promise<Material | null> {
    const row = [...this.tables.materials.values()].find((material) => material.name === name);
    return row ? clone(row) : null;
  }

  async listMaterials(status?: MaterialStatus): Promise<Material[]> {
    return [...this.tables.materials.values()]
      .filter((material) => !status || material.status === status)
      .sort(byName)
      .map(clone);
  }

  async insertMaterial(material: Material): Promise<Material> {
    logger.debug('Inserting material', { id: material.id, name: material.name });
    assertUniqueMaterialName(this.tables.materials.values(), material);
    this.tables.materials.set(material.id, clone(material));
    return clone(material);
  }

  async findApplicationById(id: string): Promise<Application | null> {
    const row = this.tables.applications.get(id);
    return row ? clone(row) : null;
  }

  async listApplications(filter: ApplicationFilter): Promise<Application[]> {
    return [...this.tables.applications.values()]
      .filter((app) => !filter.requesterId || app.requesterId === filter.requesterId)
      .filter((app) => !filter.venueId || app.venueId === filter.venueId)
      .filter((app) => !filter.statuses || filter.statuses.includes(app.status))
      .sort(byNewestFirst)
      .map(clone);
  }

  async listActiveApplicationsForVenue(venueId: string, _window: TimeWindow): Promise<Application[]> {
    return [...this.tables.applications.values()]
      .filter((app) => app.venueId === venueId && isActiveStatus(app.status))
      .map(clone);
  }

  async runInTransaction<T>(
    scope: LockScope,
    work: (tx: StoreTransaction) => Promise<T>
  ): Promise<T> {
    const keys = [
      ...(scope.venueIds ?? []).map((id) => `venue:${id}`),
      ...(scope.materialIds ?? []).map((id) => `material:${id}`),
      ...(scope.applicationIds ?? []).map((id) => `application:${id}`),
    ];

    const release = await this.locks.acquire(keys);

    try {
      const tx = new InMemoryTransaction(this.tables);
      const result = await work(tx);
      tx.commit();
      return result;
    } finally {
      release();
    }
  }

  async ping(): Promise<boolean> {
    return true;
  }
}
