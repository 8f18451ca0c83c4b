import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryReservationStore } from '../../src/repositories/memory.store';
import { ErrorCode, StoreConflictError } from '../../src/types/error.types';
import {
  at,
  buildApplication,
  buildMaterial,
  buildVenue,
  MATERIAL_ID,
  OTHER_MATERIAL_ID,
  OTHER_VENUE_ID,
  seedStore,
  VENUE_ID,
} from '../helpers/fixtures';

describe('InMemoryReservationStore', () => {
  let store: InMemoryReservationStore;

  beforeEach(async () => {
    store = await seedStore();
  });

  it('should hand out copies rather than live rows', async () => {
    const material = await store.findMaterialById(MATERIAL_ID);
    if (material) material.availableQuantity = 0;

    expect((await store.findMaterialById(MATERIAL_ID))?.availableQuantity).toBe(5);
  });

  it('should list catalog rows by name with an optional status filter', async () => {
    expect((await store.listVenues()).map((venue) => venue.name)).toEqual(['Main Hall', 'Studio B']);
    expect(await store.listVenues('maintenance')).toEqual([]);
    expect((await store.listMaterials('available')).map((m) => m.name)).toEqual([
      'Folding chair',
      'Table',
    ]);
  });

  it('should filter applications by requester, venue and status', async () => {
    await store.runInTransaction({}, async (tx) => {
      await tx.insertApplication(buildApplication({ id: 'a', requesterId: 'u1' }));
      await tx.insertApplication(
        buildApplication({ id: 'b', requesterId: 'u2', venueId: OTHER_VENUE_ID, status: 'approved' })
      );
      await tx.insertApplication(buildApplication({ id: 'c', requesterId: 'u1', status: 'rejected' }));
    });

    const ids = async (filter: Parameters<typeof store.listApplications>[0]) =>
      (await store.listApplications(filter)).map((app) => app.id).sort();

    expect(await ids({ requesterId: 'u1' })).toEqual(['a', 'c']);
    expect(await ids({ venueId: OTHER_VENUE_ID })).toEqual(['b']);
    expect(await ids({ statuses: ['pending_reviewer', 'approved'] })).toEqual(['a', 'b']);
  });

  it('should only expose active applications on the venue', async () => {
    await store.runInTransaction({}, async (tx) => {
      await tx.insertApplication(buildApplication({ id: 'live' }));
      await tx.insertApplication(buildApplication({ id: 'gone', status: 'cancelled' }));
    });

    const active = await store.listActiveApplicationsForVenue(VENUE_ID, {
      startTime: at(0),
      endTime: at(23),
    });

    expect(active.map((app) => app.id)).toEqual(['live']);
  });

  it('should let a transaction read its own staged writes', async () => {
    await store.runInTransaction({ venueIds: [VENUE_ID] }, async (tx) => {
      await tx.insertApplication(buildApplication({ id: 'staged' }));

      const active = await tx.listActiveApplicationsForVenue(VENUE_ID, {
        startTime: at(0),
        endTime: at(23),
      });
      expect(active.map((app) => app.id)).toEqual(['staged']);
      expect(await store.findApplicationById('staged')).toBeNull();
    });

    expect((await store.findApplicationById('staged'))?.version).toBe(1);
  });

  it('should discard staged writes when the work throws', async () => {
    const attempt = store.runInTransaction({ materialIds: [MATERIAL_ID] }, async (tx) => {
      await tx.saveMaterial(buildMaterial({ availableQuantity: 1 }));
      throw new Error('boom');
    });

    await expect(attempt).rejects.toThrow('boom');
    expect((await store.findMaterialById(MATERIAL_ID))?.availableQuantity).toBe(5);
  });

  it('should bump versions on commit', async () => {
    await store.runInTransaction({ materialIds: [MATERIAL_ID] }, async (tx) => {
      const material = await tx.getMaterial(MATERIAL_ID);
      if (material) await tx.saveMaterial({ ...material, availableQuantity: 4 });
    });

    expect(await store.findMaterialById(MATERIAL_ID)).toMatchObject({
      availableQuantity: 4,
      version: 2,
    });
  });

  it('should refuse to commit a row written from a stale read', async () => {
    const attempt = store.runInTransaction({}, async (tx) => {
      await tx.saveMaterial(buildMaterial({ version: 7 }));
    });

    await expect(attempt).rejects.toBeInstanceOf(StoreConflictError);
  });

  it('should list applications of every status that use a venue or material', async () => {
    await store.runInTransaction({}, async (tx) => {
      await tx.insertApplication(buildApplication({ id: 'held' }));
      await tx.insertApplication(
        buildApplication({
          id: 'done',
          status: 'rejected',
          lineItems: [{ materialId: OTHER_MATERIAL_ID, quantity: 1 }],
        })
      );
    });

    await store.runInTransaction({}, async (tx) => {
      const ids = (apps: { id: string }[]) => apps.map((app) => app.id).sort();

      expect(ids(await tx.listApplicationsUsingVenue(VENUE_ID))).toEqual(['done', 'held']);
      expect(ids(await tx.listApplicationsUsingVenue(OTHER_VENUE_ID))).toEqual([]);
      expect(ids(await tx.listApplicationsUsingMaterial(MATERIAL_ID))).toEqual(['held']);
      expect(ids(await tx.listApplicationsUsingMaterial(OTHER_MATERIAL_ID))).toEqual(['done']);
    });
  });

  it('should hide a deleted row from the rest of its transaction and drop it on commit', async () => {
    await store.runInTransaction({ venueIds: [OTHER_VENUE_ID] }, async (tx) => {
      const venue = await tx.getVenue(OTHER_VENUE_ID);
      if (venue) await tx.deleteVenue(venue);

      expect(await tx.getVenue(OTHER_VENUE_ID)).toBeNull();
      expect(await store.findVenueById(OTHER_VENUE_ID)).not.toBeNull();
    });

    expect(await store.findVenueById(OTHER_VENUE_ID)).toBeNull();
    expect((await store.listVenues()).map((venue) => venue.id)).toEqual([VENUE_ID]);
  });

  it('should refuse to delete a row from a stale read', async () => {
    const attempt = store.runInTransaction({}, async (tx) => {
      await tx.deleteVenue(buildVenue({ version: 7 }));
    });

    await expect(attempt).rejects.toBeInstanceOf(StoreConflictError);
    expect(await store.findVenueById(VENUE_ID)).not.toBeNull();
  });

  it('should keep material names unique on insert and on commit', async () => {
    await expect(
      store.insertMaterial(buildMaterial({ id: 'm-3', name: 'Table' }))
    ).rejects.toMatchObject({ code: ErrorCode.DUPLICATE_NAME, details: { name: 'Table' } });

    const rename = store.runInTransaction({ materialIds: [MATERIAL_ID] }, async (tx) => {
      const chairs = await tx.getMaterial(MATERIAL_ID);
      if (chairs) await tx.saveMaterial({ ...chairs, name: 'Table' });
    });

    await expect(rename).rejects.toMatchObject({ code: ErrorCode.DUPLICATE_NAME });
    expect((await store.findMaterialById(MATERIAL_ID))?.name).toBe('Folding chair');
    expect((await store.findMaterialByName('Table'))?.id).toBe(OTHER_MATERIAL_ID);
  });

  it('should answer pings', async () => {
    expect(await store.ping()).toBe(true);
    expect(store.driver).toBe('memory');
  });
});
