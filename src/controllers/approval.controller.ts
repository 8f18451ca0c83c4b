import { Request, Response } from 'express';
import { ReservationCoordinator } from '../services/reservation-coordinator.service';
import { createListResponse, createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import { actorOf } from '../middleware/actor.middleware';
import {
  approveApplicationSchema,
  rejectApplicationSchema,
} from '../validators/application.validator';

/**
 * Approval Controller
 *
 * HTTP request handlers for reviewers and admins
 */
export class ApprovalController {
  constructor(private coordinator: ReservationCoordinator) {}

  /**
   * GET /v1/approvals/pending
   * Applications waiting on the caller's tier
   */
  listPending = asyncHandler(async (req: Request, res: Response) => {
    const actor = actorOf(req);

    const applications = await this.coordinator.listPendingForRole(actor.role);

    res.status(200).json(createListResponse(applications));
  });

  /**
   * POST /v1/approvals/:id/approve
   */
  approve = asyncHandler(async (req: Request, res: Response) => {
    const actor = actorOf(req);
    const { params } = parseRequest(approveApplicationSchema, req);

    const application = await this.coordinator.approve(params.id, actor.id, actor.role);

    res.status(200).json(createSuccessResponse(application));
  });

  /**
   * POST /v1/approvals/:id/reject
   */
  reject = asyncHandler(async (req: Request, res: Response) => {
    const actor = actorOf(req);
    const { params, body } = parseRequest(rejectApplicationSchema, req);

    const application = await this.coordinator.reject(params.id, actor.id, actor.role, body.reason);

    res.status(200).json(createSuccessResponse(application));
  });
}
