import { Router } from 'express';
import { createApplicationRoutes } from './v1/applications.routes';
import { createApprovalRoutes } from './v1/approvals.routes';
import { createVenueRoutes } from './v1/venues.routes';
import { createMaterialRoutes } from './v1/materials.routes';
import type { ReservationStore } from '../repositories/store.types';
import type { ReservationCoordinator } from '../services/reservation-coordinator.service';
import type { VenueService } from '../services/venue.service';
import type { MaterialService } from '../services/material.service';
import type { HealthCheckResponse } from '../types/api.types';
import { asyncHandler } from '../utils/async-handler';
import { logger } from '../config/logger';

export interface AppServices {
  store: ReservationStore;
  coordinator: ReservationCoordinator;
  venueService: VenueService;
  materialService: MaterialService;
}

/**
 * API Routes Aggregator
 */
export function createRoutes(services: AppServices): Router {
  const router = Router();

  // v1 routes
  router.use('/v1/applications', createApplicationRoutes(services.coordinator));
  router.use('/v1/approvals', createApprovalRoutes(services.coordinator));
  router.use('/v1/venues', createVenueRoutes(services.venueService, services.coordinator));
  router.use('/v1/materials', createMaterialRoutes(services.materialService));

  // Health check endpoint
  router.get(
    '/health',
    asyncHandler(async (_req, res) => {
      let reachable = false;
      try {
        reachable = await services.store.ping();
      } catch (error) {
        logger.error('Health check store ping failed', { error });
      }

      const body: HealthCheckResponse = {
        status: reachable ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        store: { driver: services.store.driver, reachable },
        uptime: process.uptime(),
      };

      res.status(reachable ? 200 : 503).json(body);
    })
  );

  // API version info
  router.get('/v1', (_req, res) => {
    res.status(200).json({
      version: '1.0.0',
      api: 'Venue Reservation API',
    });
  });

  return router;
}
