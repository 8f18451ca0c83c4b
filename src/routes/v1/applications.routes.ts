import { Router } from 'express';
import { ApplicationController } from '../../controllers/application.controller';
import { ReservationCoordinator } from '../../services/reservation-coordinator.service';
import { requireActor } from '../../middleware/actor.middleware';
import { validate } from '../../middleware/validation.middleware';
import {
  cancelApplicationSchema,
  createApplicationSchema,
  getApplicationSchema,
  listApplicationsSchema,
} from '../../validators/application.validator';

/**
 * Application routes (v1)
 */
export function createApplicationRoutes(coordinator: ReservationCoordinator): Router {
  const router = Router();
  const applicationController = new ApplicationController(coordinator);

  router.use(requireActor);

  /**
   * @swagger
   * /v1/applications:
   *   post:
   *     summary: Submit an application for a venue and materials
   *     description: |
   *       Members enter the reviewer queue; reviewers and admins go straight to the admin queue.
   *       Requested materials are held from submission until rejection or cancellation.
   *     tags: [Applications]
   *     security:
   *       - actorId: []
   *         actorRole: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - venue_id
   *               - activity_name
   *               - start_time
   *               - end_time
   *               - materials
   *             properties:
   *               venue_id:
   *                 type: string
   *                 format: uuid
   *               activity_name:
   *                 type: string
   *               activity_description:
   *                 type: string
   *               start_time:
   *                 type: string
   *                 format: date-time
   *               end_time:
   *                 type: string
   *                 format: date-time
   *               materials:
   *                 type: array
   *                 minItems: 1
   *                 items:
   *                   type: object
   *                   required: [material_id, quantity]
   *                   properties:
   *                     material_id:
   *                       type: string
   *                       format: uuid
   *                     quantity:
   *                       type: integer
   *                       minimum: 1
   *     responses:
   *       201:
   *         description: Application submitted
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Application'
   *       400:
   *         description: Invalid interval, start in the past or malformed line items
   *       404:
   *         description: Venue or material not found
   *       409:
   *         description: Venue under maintenance, overlapping booking or insufficient stock
   */
  router.post('/', validate(createApplicationSchema), applicationController.createApplication);

  /**
   * @swagger
   * /v1/applications:
   *   get:
   *     summary: List the caller's own applications
   *     tags: [Applications]
   *     parameters:
   *       - in: query
   *         name: status
   *         schema:
   *           type: string
   *           enum: [pending_reviewer, pending_admin, approved, rejected, cancelled]
   *     responses:
   *       200:
   *         description: Applications, newest first
   */
  router.get('/', validate(listApplicationsSchema), applicationController.listApplications);

  /**
   * @swagger
   * /v1/applications/{id}:
   *   get:
   *     summary: Get an application with venue, stock levels and the caller's available actions
   *     tags: [Applications]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Application details
   *       403:
   *         description: Members may only view their own applications
   *       404:
   *         description: Application not found
   */
  router.get('/:id', validate(getApplicationSchema), applicationController.getApplication);

  /**
   * @swagger
   * /v1/applications/{id}/cancel:
   *   post:
   *     summary: Cancel an application (requester or admin)
   *     tags: [Applications]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Application cancelled and materials returned
   *       403:
   *         description: Caller is neither the requester nor an admin
   *       409:
   *         description: Application is already rejected or cancelled
   */
  router.post(
    '/:id/cancel',
    validate(cancelApplicationSchema),
    applicationController.cancelApplication
  );

  return router;
}
