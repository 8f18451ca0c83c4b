import { Request, Response } from 'express';
import { ReservationCoordinator } from '../services/reservation-coordinator.service';
import { createListResponse, createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import { actorOf } from '../middleware/actor.middleware';
import {
  cancelApplicationSchema,
  createApplicationSchema,
  getApplicationSchema,
  listApplicationsSchema,
} from '../validators/application.validator';

/**
 * Application Controller
 *
 * HTTP request handlers for the requester side of applications
 */
export class ApplicationController {
  constructor(private coordinator: ReservationCoordinator) {}

  /**
   * POST /v1/applications
   * Submit an application for a venue and materials
   */
  createApplication = asyncHandler(async (req: Request, res: Response) => {
    const actor = actorOf(req);
    const { body } = parseRequest(createApplicationSchema, req);

    const application = await this.coordinator.createApplication({
      requesterId: actor.id,
      requesterRole: actor.role,
      venueId: body.venue_id,
      activityName: body.activity_name,
      activityDescription: body.activity_description,
      startTime: new Date(body.start_time),
      endTime: new Date(body.end_time),
      lineItems: body.materials.map((item) => ({
        materialId: item.material_id,
        quantity: item.quantity,
      })),
    });

    res.status(201).json(createSuccessResponse(application));
  });

  /**
   * GET /v1/applications
   * The caller's own applications, newest first
   */
  listApplications = asyncHandler(async (req: Request, res: Response) => {
    const actor = actorOf(req);
    const { query } = parseRequest(listApplicationsSchema, req);

    const applications = await this.coordinator.listApplicationsByRequester(actor.id, query.status);

    res.status(200).json(createListResponse(applications));
  });

  /**
   * GET /v1/applications/:id
   * Application with venue, stock levels and available actions
   */
  getApplication = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(getApplicationSchema, req);

    const details = await this.coordinator.getApplicationDetails(params.id, actorOf(req));

    res.status(200).json(createSuccessResponse(details));
  });

  /**
   * POST /v1/applications/:id/cancel
   * Withdraw an application and return its materials
   */
  cancelApplication = asyncHandler(async (req: Request, res: Response) => {
    const actor = actorOf(req);
    const { params } = parseRequest(cancelApplicationSchema, req);

    const application = await this.coordinator.cancel(params.id, actor.id, actor.role);

    res.status(200).json(createSuccessResponse(application, 'Application cancelled'));
  });
}
