import { describe, it, expect, vi } from 'vitest';
import type { SupabaseClient } from '@supabase/supabase-js';
import { SupabaseReservationStore } from '../../src/repositories/supabase.store';
import type { StoreTransaction } from '../../src/repositories/store.types';
import { VenueService } from '../../src/services/venue.service';
import { MaterialService } from '../../src/services/material.service';
import { AppError, ErrorCode } from '../../src/types/error.types';
import type { ApplicationRow } from '../../src/types/application.types';
import type { MaterialRow } from '../../src/types/material.types';
import type { VenueRow } from '../../src/types/venue.types';
import {
  admin,
  at,
  buildApplication,
  buildMaterial,
  buildVenue,
  fixedClock,
  MATERIAL_ID,
  NOW,
  OTHER_MATERIAL_ID,
  VENUE_ID,
} from '../helpers/fixtures';

interface DbError {
  code: string;
  message: string;
  details: string;
  hint: string;
}

interface QueryResult {
  data: unknown;
  error: DbError | null;
}

type Responder = (query: StubQuery) => QueryResult;

/**
 * Chainable stand-in for a PostgREST query builder. Records each call and
 * resolves, when awaited, with what the test's responder returns.
 */
class StubQuery implements PromiseLike<QueryResult> {
  readonly calls: Array<[string, unknown[]]> = [];

  select = this.chain('select');
  insert = this.chain('insert');
  eq = this.chain('eq');
  in = this.chain('in');
  lt = this.chain('lt');
  gt = this.chain('gt');
  order = this.chain('order');
  limit = this.chain('limit');
  single = this.chain('single');
  maybeSingle = this.chain('maybeSingle');

  constructor(
    readonly table: string,
    private respond: Responder
  ) {}

  argsOf(method: string): unknown[][] {
    return this.calls.filter(([name]) => name === method).map(([, args]) => args);
  }

  then<TResult1 = QueryResult, TResult2 = never>(
    onfulfilled?: ((value: QueryResult) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): PromiseLike<TResult1 | TResult2> {
    return Promise.resolve(this.respond(this)).then(onfulfilled, onrejected);
  }

  private chain(method: string) {
    return vi.fn((...args: unknown[]) => {
      this.calls.push([method, args]);
      return this;
    });
  }
}

const ok = (data: unknown): QueryResult => ({ data, error: null });

const dbError = (code: string, message: string, details = ''): DbError => ({
  code,
  message,
  details,
  hint: '',
});

const noRows = dbError(
  'PGRST116',
  'JSON object requested, multiple (or no) rows returned',
  'The result contains 0 rows'
);

const staleVersion = dbError('40001', 'stale venue 11111111-1111-4111-8111-111111111111');

function stubClient(respond: Responder) {
  const queries: StubQuery[] = [];
  const from = vi.fn((table: string) => {
    const query = new StubQuery(table, respond);
    queries.push(query);
    return query;
  });
  const rpc = vi.fn(
    async (_fn: string, _args: Record<string, unknown>): Promise<QueryResult> => ok(null)
  );

  const client = { from, rpc } as unknown as SupabaseClient;
  return { client, from, rpc, queries };
}

function venueRow(overrides: Partial<VenueRow> = {}): VenueRow {
  const venue = buildVenue();
  return {
    id: venue.id,
    name: venue.name,
    location: venue.location,
    capacity: venue.capacity,
    description: venue.description,
    equipment: venue.equipment,
    status: venue.status,
    version: venue.version,
    created_at: NOW.toISOString(),
    updated_at: NOW.toISOString(),
    ...overrides,
  };
}

function materialRow(overrides: Partial<MaterialRow> = {}): MaterialRow {
  const material = buildMaterial();
  return {
    id: material.id,
    name: material.name,
    category: material.category,
    unit: material.unit,
    description: material.description,
    total_quantity: material.totalQuantity,
    available_quantity: material.availableQuantity,
    status: material.status,
    version: material.version,
    created_at: NOW.toISOString(),
    updated_at: NOW.toISOString(),
    ...overrides,
  };
}

function applicationRow(overrides: Partial<ApplicationRow> = {}): ApplicationRow {
  return {
    id: 'app-1',
    requester_id: 'member-1',
    activity_name: 'Club meeting',
    activity_description: '',
    venue_id: VENUE_ID,
    start_time: at(10).toISOString(),
    end_time: at(12).toISOString(),
    status: 'pending_reviewer',
    reviewer_id: null,
    rejection_reason: null,
    version: 1,
    created_at: NOW.toISOString(),
    reviewed_at: null,
    updated_at: NOW.toISOString(),
    application_line_items: [],
    ...overrides,
  };
}

const createStore = (client: SupabaseClient, commitRetries = 3) =>
  new SupabaseReservationStore(client, { commitRetries });

describe('SupabaseReservationStore', () => {
  describe('reads', () => {
    it('should map a venue row to a venue', async () => {
      const { client, queries } = stubClient(() => ok(venueRow()));

      const venue = await createStore(client).findVenueById(VENUE_ID);

      expect(venue).toEqual(buildVenue());
      expect(queries[0]?.table).toBe('venues');
      expect(queries[0]?.argsOf('eq')).toEqual([['id', VENUE_ID]]);
      expect(queries[0]?.argsOf('single')).toHaveLength(1);
    });

    it('should treat PGRST116 as a missing row', async () => {
      const { client } = stubClient(() => ({ data: null, error: noRows }));

      await expect(createStore(client).findVenueById(VENUE_ID)).resolves.toBeNull();
      await expect(createStore(client).findMaterialById(MATERIAL_ID)).resolves.toBeNull();
      await expect(createStore(client).findApplicationById('app-1')).resolves.toBeNull();
    });

    it('should raise DATABASE_ERROR for any other read failure', async () => {
      const { client } = stubClient(() => ({
        data: null,
        error: dbError('08006', 'connection failure'),
      }));

      await expect(createStore(client).findVenueById(VENUE_ID)).rejects.toMatchObject({
        code: ErrorCode.DATABASE_ERROR,
        statusCode: 500,
      });
    });

    it('should order line items by position and omit empty review fields', async () => {
      const { client, queries } = stubClient(() =>
        ok(
          applicationRow({
            application_line_items: [
              { application_id: 'app-1', position: 1, material_id: OTHER_MATERIAL_ID, quantity: 4 },
              { application_id: 'app-1', position: 0, material_id: MATERIAL_ID, quantity: 2 },
            ],
          })
        )
      );

      const application = await createStore(client).findApplicationById('app-1');

      expect(application?.lineItems).toEqual([
        { materialId: MATERIAL_ID, quantity: 2 },
        { materialId: OTHER_MATERIAL_ID, quantity: 4 },
      ]);
      expect(application).not.toHaveProperty('reviewerId');
      expect(application).not.toHaveProperty('reviewedAt');
      expect(queries[0]?.argsOf('select')).toEqual([['*, application_line_items(*)']]);
    });

    it('should pre-filter active applications to the window', async () => {
      const { client, queries } = stubClient(() => ok([applicationRow()]));

      const active = await createStore(client).listActiveApplicationsForVenue(VENUE_ID, {
        startTime: at(10),
        endTime: at(12),
      });

      expect(active.map((application) => application.id)).toEqual(['app-1']);
      const query = queries[0];
      expect(query?.argsOf('eq')).toEqual([['venue_id', VENUE_ID]]);
      expect(query?.argsOf('in')).toEqual([['status', ['pending_reviewer', 'pending_admin', 'approved']]]);
      expect(query?.argsOf('lt')).toEqual([['start_time', at(12).toISOString()]]);
      expect(query?.argsOf('gt')).toEqual([['end_time', at(10).toISOString()]]);
    });
  });

  describe('commit', () => {
    const catalog: Responder = (query) => {
      switch (query.table) {
        case 'venues':
          return ok(venueRow({ version: 3 }));
        case 'materials':
          return ok(materialRow({ version: 2 }));
        default:
          return ok([]);
      }
    };

    it('should send every write with the version it was read at', async () => {
      const { client, rpc } = stubClient(catalog);

      await createStore(client).runInTransaction(
        { venueIds: [VENUE_ID], materialIds: [MATERIAL_ID] },
        async (tx) => {
          await tx.getVenue(VENUE_ID);
          const chairs = await tx.getMaterial(MATERIAL_ID);
          if (!chairs) throw new Error('chairs missing');

          await tx.saveMaterial({ ...chairs, availableQuantity: 3 });
          await tx.insertApplication(
            buildApplication({ lineItems: [{ materialId: MATERIAL_ID, quantity: 2 }] })
          );
        }
      );

      expect(rpc).toHaveBeenCalledTimes(1);
      expect(rpc).toHaveBeenCalledWith('commit_reservation_changes', {
        p_venues: [{ id: VENUE_ID, expected_version: 3, changes: null }],
        p_materials: [
          {
            id: MATERIAL_ID,
            expected_version: 2,
            changes: {
              id: MATERIAL_ID,
              name: 'Folding chair',
              category: 'furniture',
              unit: 'pcs',
              description: '',
              total_quantity: 5,
              available_quantity: 3,
              status: 'available',
              updated_at: NOW.toISOString(),
            },
          },
        ],
        p_new_applications: [
          expect.objectContaining({
            id: 'app-1',
            venue_id: VENUE_ID,
            status: 'pending_reviewer',
            line_items: [{ position: 0, material_id: MATERIAL_ID, quantity: 2 }],
          }),
        ],
        p_updated_applications: [],
        p_deleted_venues: [],
        p_deleted_materials: [],
      });
    });

    it('should re-run the unit of work after a lost version check', async () => {
      const { client, rpc } = stubClient(catalog);
      rpc.mockResolvedValueOnce({ data: null, error: staleVersion });

      const work = vi.fn(async (tx: StoreTransaction) => {
        await tx.getVenue(VENUE_ID);
        return 'committed';
      });

      await expect(createStore(client).runInTransaction({ venueIds: [VENUE_ID] }, work)).resolves.toBe(
        'committed'
      );
      expect(work).toHaveBeenCalledTimes(2);
      expect(rpc).toHaveBeenCalledTimes(2);
    });

    it('should not retry a business error raised by the unit of work', async () => {
      const { client, rpc } = stubClient(catalog);
      const conflict = new AppError(ErrorCode.SCHEDULING_CONFLICT, 'Venue is booked', 409);

      const work = vi.fn(async (tx: StoreTransaction) => {
        await tx.getVenue(VENUE_ID);
        throw conflict;
      });

      await expect(createStore(client).runInTransaction({ venueIds: [VENUE_ID] }, work)).rejects.toBe(
        conflict
      );
      expect(work).toHaveBeenCalledTimes(1);
      expect(rpc).not.toHaveBeenCalled();
    });

    it('should report STORE_CONTENTION once retries run out', async () => {
      const { client, rpc } = stubClient(catalog);
      rpc.mockResolvedValue({ data: null, error: staleVersion });

      await expect(
        createStore(client, 2).runInTransaction({ venueIds: [VENUE_ID] }, async (tx) => {
          await tx.getVenue(VENUE_ID);
        })
      ).rejects.toMatchObject({ code: ErrorCode.STORE_CONTENTION, statusCode: 503 });
      expect(rpc).toHaveBeenCalledTimes(3);
    });

    it('should fail fast on any other commit error', async () => {
      const { client, rpc } = stubClient(catalog);
      rpc.mockResolvedValue({
        data: null,
        error: dbError('23503', 'insert or update on table "applications" violates foreign key constraint'),
      });

      await expect(
        createStore(client).runInTransaction({ venueIds: [VENUE_ID] }, async (tx) => {
          await tx.getVenue(VENUE_ID);
        })
      ).rejects.toMatchObject({ code: ErrorCode.DATABASE_ERROR, statusCode: 500 });
      expect(rpc).toHaveBeenCalledTimes(1);
    });

    it('should map a material name clash to DUPLICATE_NAME', async () => {
      const { client, rpc } = stubClient(catalog);
      rpc.mockResolvedValue({
        data: null,
        error: dbError(
          '23505',
          'duplicate key value violates unique constraint "materials_name_unique"',
          'Key (name)=(Table) already exists.'
        ),
      });

      await expect(
        createStore(client).runInTransaction({ materialIds: [MATERIAL_ID] }, async (tx) => {
          const chairs = await tx.getMaterial(MATERIAL_ID);
          if (chairs) await tx.saveMaterial({ ...chairs, name: 'Table' });
        })
      ).rejects.toMatchObject({
        code: ErrorCode.DUPLICATE_NAME,
        statusCode: 409,
        details: { name: 'Table' },
      });
      expect(rpc).toHaveBeenCalledTimes(1);
    });
  });

  describe('catalog writes', () => {
    it('should map a duplicate name on insert to DUPLICATE_NAME', async () => {
      const { client } = stubClient(() => ({
        data: null,
        error: dbError(
          '23505',
          'duplicate key value violates unique constraint "materials_name_unique"',
          'Key (name)=(Table) already exists.'
        ),
      }));

      await expect(
        createStore(client).insertMaterial(buildMaterial({ id: 'm-3', name: 'Table' }))
      ).rejects.toMatchObject({ code: ErrorCode.DUPLICATE_NAME, details: { name: 'Table' } });
    });

    it('should look materials up by exact name', async () => {
      const { client, queries } = stubClient(() => ok(null));

      await expect(createStore(client).findMaterialByName('Table')).resolves.toBeNull();
      expect(queries[0]?.argsOf('eq')).toEqual([['name', 'Table']]);
      expect(queries[0]?.argsOf('maybeSingle')).toHaveLength(1);
    });

    it('should delete an unused venue by version without a guard entry', async () => {
      const { client, rpc, queries } = stubClient((query) =>
        query.table === 'venues' ? ok(venueRow({ version: 4 })) : ok([])
      );

      await new VenueService(createStore(client), fixedClock).deleteVenue(admin, VENUE_ID);

      const usage = queries.find((query) => query.table === 'applications');
      expect(usage?.argsOf('eq')).toEqual([['venue_id', VENUE_ID]]);
      expect(rpc).toHaveBeenCalledWith(
        'commit_reservation_changes',
        expect.objectContaining({
          p_venues: [],
          p_deleted_venues: [{ id: VENUE_ID, expected_version: 4 }],
          p_deleted_materials: [],
        })
      );
    });

    it('should refuse to delete a material an approved application still holds', async () => {
      const { client, rpc, queries } = stubClient((query) => {
        switch (query.table) {
          case 'materials':
            return ok(materialRow());
          case 'application_line_items':
            return ok([{ application_id: 'app-7' }, { application_id: 'app-7' }]);
          default:
            return ok([applicationRow({ id: 'app-7', status: 'approved' })]);
        }
      });

      await expect(
        new MaterialService(createStore(client), fixedClock).deleteMaterial(admin, MATERIAL_ID)
      ).rejects.toMatchObject({
        code: ErrorCode.RESOURCE_UNAVAILABLE,
        statusCode: 409,
        details: { activeApplicationIds: ['app-7'], applicationCount: 1 },
      });

      const lookup = queries.find((query) => query.table === 'applications');
      expect(lookup?.argsOf('in')).toEqual([['id', ['app-7']]]);
      expect(rpc).not.toHaveBeenCalled();
    });
  });
});
