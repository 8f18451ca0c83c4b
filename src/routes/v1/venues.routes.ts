import { Router } from 'express';
import { VenueController } from '../../controllers/venue.controller';
import { VenueService } from '../../services/venue.service';
import { ReservationCoordinator } from '../../services/reservation-coordinator.service';
import { requireActor } from '../../middleware/actor.middleware';
import { validate } from '../../middleware/validation.middleware';
import {
  availableVenuesSchema,
  createVenueSchema,
  deleteVenueSchema,
  getVenueSchema,
  listVenuesSchema,
  setVenueStatusSchema,
  updateVenueSchema,
} from '../../validators/venue.validator';

/**
 * Venue routes (v1)
 *
 * Reads are public; edits need an admin identity.
 */
export function createVenueRoutes(
  venueService: VenueService,
  coordinator: ReservationCoordinator
): Router {
  const router = Router();
  const venueController = new VenueController(venueService, coordinator);

  /**
   * @swagger
   * /v1/venues:
   *   get:
   *     summary: List venues
   *     tags: [Venues]
   *     parameters:
   *       - in: query
   *         name: status
   *         schema:
   *           type: string
   *           enum: [available, maintenance]
   *     responses:
   *       200:
   *         description: Venues ordered by name
   */
  router.get('/', validate(listVenuesSchema), venueController.listVenues);

  /**
   * @swagger
   * /v1/venues/available:
   *   get:
   *     summary: Venues free for a time window
   *     description: Excludes venues under maintenance and venues with an overlapping active booking.
   *     tags: [Venues]
   *     parameters:
   *       - in: query
   *         name: start_time
   *         required: true
   *         schema:
   *           type: string
   *           format: date-time
   *       - in: query
   *         name: end_time
   *         required: true
   *         schema:
   *           type: string
   *           format: date-time
   *     responses:
   *       200:
   *         description: Free venues
   *       400:
   *         description: Invalid window
   */
  router.get('/available', validate(availableVenuesSchema), venueController.listAvailableVenues);

  /**
   * @swagger
   * /v1/venues/{id}:
   *   get:
   *     summary: Get venue by ID
   *     tags: [Venues]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Venue retrieved successfully
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Venue'
   *       404:
   *         description: Venue not found
   */
  router.get('/:id', validate(getVenueSchema), venueController.getVenue);

  /**
   * @swagger
   * /v1/venues:
   *   post:
   *     summary: Create a venue (admin)
   *     tags: [Venues]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [name, location, capacity]
   *             properties:
   *               name:
   *                 type: string
   *               location:
   *                 type: string
   *               capacity:
   *                 type: integer
   *                 minimum: 1
   *               description:
   *                 type: string
   *               equipment:
   *                 type: array
   *                 items:
   *                   type: string
   *               status:
   *                 type: string
   *                 enum: [available, maintenance]
   *     responses:
   *       201:
   *         description: Venue created
   *       403:
   *         description: Admin role required
   */
  router.post('/', requireActor, validate(createVenueSchema), venueController.createVenue);

  /**
   * @swagger
   * /v1/venues/{id}:
   *   patch:
   *     summary: Edit a venue's descriptive fields (admin)
   *     tags: [Venues]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Venue updated
   *       403:
   *         description: Admin role required
   *       404:
   *         description: Venue not found
   */
  router.patch('/:id', requireActor, validate(updateVenueSchema), venueController.updateVenue);

  /**
   * @swagger
   * /v1/venues/{id}/status:
   *   put:
   *     summary: Put a venue into or out of maintenance (admin)
   *     tags: [Venues]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [status]
   *             properties:
   *               status:
   *                 type: string
   *                 enum: [available, maintenance]
   *     responses:
   *       200:
   *         description: Status changed
   *       403:
   *         description: Admin role required
   */
  router.put(
    '/:id/status',
    requireActor,
    validate(setVenueStatusSchema),
    venueController.setVenueStatus
  );

  /**
   * @swagger
   * /v1/venues/{id}:
   *   delete:
   *     summary: Delete a venue (admin)
   *     description: Refused while any application, active or finished, references the venue.
   *     tags: [Venues]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Venue deleted
   *       403:
   *         description: Admin role required
   *       404:
   *         description: Venue not found
   *       409:
   *         description: Venue is referenced by applications
   */
  router.delete('/:id', requireActor, validate(deleteVenueSchema), venueController.deleteVenue);

  return router;
}
