import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'http';
import axios, { AxiosInstance } from 'axios';
import { createApp, createServices } from '../../src/app';
import {
  at,
  fixedClock,
  MATERIAL_ID,
  MISSING_ID,
  OTHER_VENUE_ID,
  seedStore,
  VENUE_ID,
} from '../helpers/fixtures';

/**
 * End-to-end flow over HTTP against the in-process store
 */
describe('Venue Reservation API', () => {
  let server: Server;
  let api: AxiosInstance;

  const actingAs = (id: string, role: string) => ({
    headers: { 'x-actor-id': id, 'x-actor-role': role },
  });

  beforeAll(async () => {
    const store = await seedStore();
    const app = createApp(createServices(store, fixedClock));

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });

    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Test server is not listening on a TCP port');
    }

    api = axios.create({
      baseURL: `http://127.0.0.1:${address.port}`,
      validateStatus: () => true,
    });
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  it('should report health with the store driver', async () => {
    const res = await api.get('/health');

    expect(res.status).toBe(200);
    expect(res.data.status).toBe('healthy');
    expect(res.data.store).toEqual({ driver: 'memory', reachable: true });
  });

  it('should serve the OpenAPI document', async () => {
    const res = await api.get('/openapi.json');

    expect(res.status).toBe(200);
    expect(res.data.info.title).toBe('Venue Reservation API');
  });

  it('should require caller identity on application routes', async () => {
    const missing = await api.get('/v1/applications');
    expect(missing.status).toBe(401);
    expect(missing.data.error.code).toBe('UNAUTHENTICATED');

    const badRole = await api.get('/v1/applications', actingAs('u1', 'janitor'));
    expect(badRole.status).toBe(401);
  });

  it('should reject malformed bodies with field details', async () => {
    const res = await api.post(
      '/v1/applications',
      {
        venue_id: 'not-a-uuid',
        activity_name: 'Quiz night',
        start_time: at(10).toISOString(),
        end_time: at(12).toISOString(),
        materials: [],
      },
      actingAs('student-1', 'member')
    );

    expect(res.status).toBe(400);
    expect(res.data.error.code).toBe('VALIDATION_ERROR');
    expect(res.data.error.details.errors).toEqual(
      expect.arrayContaining([
        { field: 'body.venue_id', message: 'Invalid venue ID format' },
        { field: 'body.materials', message: 'At least one material must be requested' },
      ])
    );
  });

  it('should walk an application through both approval tiers and cancellation', async () => {
    const created = await api.post(
      '/v1/applications',
      {
        venue_id: VENUE_ID,
        activity_name: 'Quiz night',
        start_time: at(10).toISOString(),
        end_time: at(12).toISOString(),
        materials: [{ material_id: MATERIAL_ID, quantity: 3 }],
      },
      actingAs('student-1', 'member')
    );
    expect(created.status).toBe(201);
    expect(created.data.data.status).toBe('pending_reviewer');
    const id: string = created.data.data.id;

    const clash = await api.post(
      '/v1/applications',
      {
        venue_id: VENUE_ID,
        activity_name: 'Film club',
        start_time: at(11).toISOString(),
        end_time: at(13).toISOString(),
        materials: [{ material_id: MATERIAL_ID, quantity: 1 }],
      },
      actingAs('student-2', 'member')
    );
    expect(clash.status).toBe(409);
    expect(clash.data.error.code).toBe('SCHEDULING_CONFLICT');
    expect(clash.data.error.details.conflictingApplicationId).toBe(id);

    const short = await api.post(
      '/v1/applications',
      {
        venue_id: OTHER_VENUE_ID,
        activity_name: 'Film club',
        start_time: at(10).toISOString(),
        end_time: at(12).toISOString(),
        materials: [{ material_id: MATERIAL_ID, quantity: 3 }],
      },
      actingAs('student-2', 'member')
    );
    expect(short.status).toBe(409);
    expect(short.data.error.details).toEqual({ materialId: MATERIAL_ID, requested: 3, available: 2 });

    const queue = await api.get('/v1/approvals/pending', actingAs('rev-1', 'reviewer'));
    expect(queue.data.data.map((app: { id: string }) => app.id)).toEqual([id]);

    const earlyAdmin = await api.post(`/v1/approvals/${id}/approve`, {}, actingAs('rev-1', 'reviewer'));
    expect(earlyAdmin.data.data.status).toBe('pending_admin');

    const reviewerAgain = await api.post(`/v1/approvals/${id}/approve`, {}, actingAs('rev-1', 'reviewer'));
    expect(reviewerAgain.status).toBe(403);
    expect(reviewerAgain.data.error.code).toBe('PERMISSION_DENIED');

    const approved = await api.post(`/v1/approvals/${id}/approve`, {}, actingAs('adm-1', 'admin'));
    expect(approved.status).toBe(200);
    expect(approved.data.data.status).toBe('approved');

    const details = await api.get(`/v1/applications/${id}`, actingAs('student-1', 'member'));
    expect(details.data.data.availableActions).toEqual(['cancel']);
    expect(details.data.data.lineItems[0].availableQuantity).toBe(2);

    const hidden = await api.get(`/v1/applications/${id}`, actingAs('student-2', 'member'));
    expect(hidden.status).toBe(403);

    const cancelled = await api.post(`/v1/applications/${id}/cancel`, {}, actingAs('student-1', 'member'));
    expect(cancelled.status).toBe(200);
    expect(cancelled.data.data.status).toBe('cancelled');
    expect(cancelled.data.message).toBe('Application cancelled');

    const stock = await api.get(`/v1/materials/${MATERIAL_ID}`);
    expect(stock.data.data.availableQuantity).toBe(5);

    const twice = await api.post(`/v1/applications/${id}/cancel`, {}, actingAs('student-1', 'member'));
    expect(twice.status).toBe(409);
    expect(twice.data.error.code).toBe('INVALID_STATE_TRANSITION');
  });

  it('should require a reason to reject', async () => {
    const created = await api.post(
      '/v1/applications',
      {
        venue_id: OTHER_VENUE_ID,
        activity_name: 'Board games',
        start_time: at(18).toISOString(),
        end_time: at(20).toISOString(),
        materials: [{ material_id: MATERIAL_ID, quantity: 1 }],
      },
      actingAs('staff-1', 'admin')
    );
    expect(created.data.data.status).toBe('pending_admin');
    const id: string = created.data.data.id;

    const noReason = await api.post(`/v1/approvals/${id}/reject`, {}, actingAs('adm-1', 'admin'));
    expect(noReason.status).toBe(400);

    const rejected = await api.post(
      `/v1/approvals/${id}/reject`,
      { reason: 'Overlaps exams' },
      actingAs('adm-1', 'admin')
    );
    expect(rejected.data.data).toMatchObject({ status: 'rejected', rejectionReason: 'Overlaps exams' });
  });

  it('should list venues free in a window', async () => {
    const res = await api.get('/v1/venues/available', {
      params: { start_time: at(6).toISOString(), end_time: at(7).toISOString() },
    });

    expect(res.status).toBe(200);
    expect(res.data.data.map((venue: { id: string }) => venue.id)).toEqual([VENUE_ID, OTHER_VENUE_ID]);
  });

  it('should keep catalog edits to admins', async () => {
    const denied = await api.put(
      `/v1/venues/${VENUE_ID}/status`,
      { status: 'maintenance' },
      actingAs('student-1', 'member')
    );
    expect(denied.status).toBe(403);

    const created = await api.post(
      '/v1/materials',
      { name: 'Whiteboard', category: 'stationery', unit: 'pcs', total_quantity: 4 },
      actingAs('adm-1', 'admin')
    );
    expect(created.status).toBe(201);
    expect(created.data.data).toMatchObject({ totalQuantity: 4, availableQuantity: 4 });
  });

  it('should delete unused catalog rows and refuse referenced ones', async () => {
    const asAdmin = actingAs('adm-1', 'admin');

    const venue = await api.post(
      '/v1/venues',
      { name: 'Pop-up tent', location: 'Lawn', capacity: 20 },
      asAdmin
    );
    expect(venue.status).toBe(201);
    const venueId: string = venue.data.data.id;

    expect((await api.delete(`/v1/venues/${venueId}`)).status).toBe(401);
    expect((await api.delete(`/v1/venues/${venueId}`, actingAs('student-1', 'member'))).status).toBe(
      403
    );

    const removed = await api.delete(`/v1/venues/${venueId}`, asAdmin);
    expect(removed.status).toBe(200);
    expect(removed.data).toMatchObject({ data: { id: venueId }, message: 'Venue deleted' });
    expect((await api.get(`/v1/venues/${venueId}`)).status).toBe(404);

    const booked = await api.delete(`/v1/venues/${VENUE_ID}`, asAdmin);
    expect(booked.status).toBe(409);
    expect(booked.data.error.code).toBe('RESOURCE_UNAVAILABLE');
  });

  it('should keep material names unique', async () => {
    const asAdmin = actingAs('adm-1', 'admin');
    const screen = { name: 'Projector screen', category: 'av', unit: 'pcs', total_quantity: 2 };

    const created = await api.post('/v1/materials', screen, asAdmin);
    expect(created.status).toBe(201);

    const duplicate = await api.post('/v1/materials', screen, asAdmin);
    expect(duplicate.status).toBe(409);
    expect(duplicate.data.error).toMatchObject({
      code: 'DUPLICATE_NAME',
      details: { name: 'Projector screen' },
    });

    const removed = await api.delete(`/v1/materials/${created.data.data.id}`, asAdmin);
    expect(removed.status).toBe(200);
    expect((await api.post('/v1/materials', screen, asAdmin)).status).toBe(201);
  });

  it('should validate route parameters before the handler runs', async () => {
    const res = await api.delete('/v1/materials/not-a-uuid', actingAs('adm-1', 'admin'));

    expect(res.status).toBe(400);
    expect(res.data.error).toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: { errors: [{ field: 'params.id', message: 'Invalid material ID format' }] },
    });
  });

  it('should return 404 for unknown records and routes', async () => {
    const venue = await api.get(`/v1/venues/${MISSING_ID}`);
    expect(venue.status).toBe(404);
    expect(venue.data.error.code).toBe('VENUE_NOT_FOUND');

    const route = await api.get('/v1/nowhere');
    expect(route.status).toBe(404);
    expect(route.data.error.code).toBe('NOT_FOUND');
  });
});
