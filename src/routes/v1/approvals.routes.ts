import { Router } from 'express';
import { ApprovalController } from '../../controllers/approval.controller';
import { ReservationCoordinator } from '../../services/reservation-coordinator.service';
import { requireActor } from '../../middleware/actor.middleware';
import { validate } from '../../middleware/validation.middleware';
import {
  approveApplicationSchema,
  rejectApplicationSchema,
} from '../../validators/application.validator';

/**
 * Approval routes (v1)
 */
export function createApprovalRoutes(coordinator: ReservationCoordinator): Router {
  const router = Router();
  const approvalController = new ApprovalController(coordinator);

  router.use(requireActor);

  /**
   * @swagger
   * /v1/approvals/pending:
   *   get:
   *     summary: Applications waiting on the caller's tier
   *     description: Reviewers see pending_reviewer, admins see pending_admin.
   *     tags: [Approvals]
   *     responses:
   *       200:
   *         description: Pending applications, newest first
   *       403:
   *         description: Members have no approval queue
   */
  router.get('/pending', approvalController.listPending);

  /**
   * @swagger
   * /v1/approvals/{id}/approve:
   *   post:
   *     summary: Approve an application at the caller's tier
   *     tags: [Approvals]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Application advanced to pending_admin or approved
   *       403:
   *         description: Caller's role may not act at this tier
   *       409:
   *         description: Application is not awaiting approval, or the booking no longer holds
   */
  router.post('/:id/approve', validate(approveApplicationSchema), approvalController.approve);

  /**
   * @swagger
   * /v1/approvals/{id}/reject:
   *   post:
   *     summary: Reject an application and return its materials
   *     tags: [Approvals]
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
   *             required: [reason]
   *             properties:
   *               reason:
   *                 type: string
   *     responses:
   *       200:
   *         description: Application rejected
   *       400:
   *         description: Missing rejection reason
   *       403:
   *         description: Caller's role may not act at this tier
   *       409:
   *         description: Application is not awaiting approval
   */
  router.post('/:id/reject', validate(rejectApplicationSchema), approvalController.reject);

  return router;
}
