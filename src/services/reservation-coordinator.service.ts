import { randomUUID } from 'crypto';
import type { ReservationStore, StoreTransaction } from '../repositories/store.types';
import type { Actor, ActorRole } from '../types/actor.types';
import { authorityOf } from '../types/actor.types';
import type {
  Application,
  ApplicationDetails,
  ApplicationStatus,
  CreateApplicationInput,
  LineItemDetail,
  TransitionRequest,
} from '../types/application.types';
import type { Venue } from '../types/venue.types';
import { AppError, ErrorCode } from '../types/error.types';
import { ConflictDetector } from './conflict-detector';
import { InventoryLedger, stockStatus } from './inventory-ledger';
import {
  decideTransition,
  initialStatusFor,
  legalActions,
  reviewQueueFor,
} from './approval-workflow';
import { systemClock, Clock } from '../utils/clock';
import { componentLogger } from '../config/logger';

const logger = componentLogger('coordinator');

export interface CoordinatorOptions {
  clock?: Clock;
  idGenerator?: () => string;
}

const validationError = (message: string, details?: Record<string, unknown>): AppError =>
  new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);

const isValidDate = (value: Date): boolean => !Number.isNaN(value.getTime());

/**
 * Reservation Coordinator
 *
 * The only component with transactional authority. Creation and every
 * workflow transition run as one unit of work against the store, so
 * conflict checks, inventory reservation and status changes commit together
 * or not at all.
 */
export class ReservationCoordinator {
  private clock: Clock;
  private nextId: () => string;

  constructor(
    private store: ReservationStore,
    options: CoordinatorOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.nextId = options.idGenerator ?? randomUUID;
  }

  /**
   * Submit a new application
   *
   * 1. Structural validation (interval, future start, line items)
   * 2. Venue exists and is not under maintenance
   * 3. No overlapping active booking on the venue
   * 4. Every material exists, is available and has enough stock
   * 5. Reserve all line items and persist the application in its
   *    role-determined initial status
   *
   * Steps 2-5 run under one transaction scoped to the venue and materials.
   */
  async createApplication(input: CreateApplicationInput): Promise<Application> {
    logger.info('Creating application', {
      requesterId: input.requesterId,
      venueId: input.venueId,
      startTime: input.startTime,
      endTime: input.endTime,
      lineItems: input.lineItems,
    });

    this.validateCreateInput(input);

    const scope = {
      venueIds: [input.venueId],
      materialIds: input.lineItems.map((item) => item.materialId),
    };

    const applicationId = await this.store.runInTransaction(scope, async (tx) => {
      const venue = await this.requireVenue(tx, input.venueId);
      this.assertVenueBookable(venue);

      const conflict = await new ConflictDetector(tx).findConflict(
        input.venueId,
        input.startTime,
        input.endTime
      );
      if (conflict) {
        throw new AppError(
          ErrorCode.SCHEDULING_CONFLICT,
          `Venue ${venue.name} is already booked by application ${conflict.id} for an overlapping time`,
          409,
          {
            conflictingApplicationId: conflict.id,
            conflictingStartTime: conflict.startTime.toISOString(),
            conflictingEndTime: conflict.endTime.toISOString(),
          }
        );
      }

      for (const item of input.lineItems) {
        const material = await tx.getMaterial(item.materialId);
        if (!material) {
          throw new AppError(
            ErrorCode.MATERIAL_NOT_FOUND,
            `Material with ID ${item.materialId} not found`,
            404
          );
        }
        if (material.status !== 'available') {
          throw new AppError(
            ErrorCode.RESOURCE_UNAVAILABLE,
            `Material ${material.name} is currently unavailable`,
            409,
            { materialId: material.id }
          );
        }
        if (material.availableQuantity < item.quantity) {
          throw new AppError(
            ErrorCode.INSUFFICIENT_INVENTORY,
            `Cannot reserve ${item.quantity} ${material.unit} of ${material.name}. Only ${material.availableQuantity} available.`,
            409,
            {
              materialId: material.id,
              requested: item.quantity,
              available: material.availableQuantity,
            }
          );
        }
      }

      await new InventoryLedger(tx, this.clock).reserveLineItems(input.lineItems);

      const now = this.clock();
      const application: Application = {
        id: this.nextId(),
        requesterId: input.requesterId,
        activityName: input.activityName.trim(),
        activityDescription: input.activityDescription?.trim() ?? '',
        venueId: input.venueId,
        startTime: input.startTime,
        endTime: input.endTime,
        lineItems: input.lineItems.map((item) => ({ ...item })),
        status: initialStatusFor(input.requesterRole),
        version: 1,
        createdAt: now,
        updatedAt: now,
      };

      await tx.insertApplication(application);
      return application.id;
    });

    const created = await this.requireApplication(applicationId);

    logger.info('Application created successfully', {
      applicationId: created.id,
      status: created.status,
    });

    return created;
  }

  /**
   * Drive one workflow transition
   *
   * The application is re-read and re-validated inside the transaction, so
   * of two racing transitions the loser sees the winner's status.
   */
  async transition(applicationId: string, actor: Actor, request: TransitionRequest): Promise<Application> {
    logger.info('Transitioning application', {
      applicationId,
      actorId: actor.id,
      role: actor.role,
      action: request.action,
    });

    const reason = request.action === 'reject' ? request.reason.trim() : undefined;
    if (request.action === 'reject' && !reason) {
      throw validationError('A rejection reason is required');
    }

    // Line items and venue never change, so a plain read is enough to scope the locks
    const snapshot = await this.requireApplication(applicationId);
    const scope = {
      applicationIds: [applicationId],
      venueIds: [snapshot.venueId],
      materialIds: snapshot.lineItems.map((item) => item.materialId),
    };

    await this.store.runInTransaction(scope, async (tx) => {
      const current = await tx.getApplication(applicationId);
      if (!current) {
        throw this.applicationNotFound(applicationId);
      }

      const decision = decideTransition(current, actor, request.action);

      if (request.action === 'approve') {
        await this.recheckHold(tx, current);
      }

      if (decision.effect === 'release_hold') {
        await new InventoryLedger(tx, this.clock).releaseHold(current);
      }

      const now = this.clock();
      const next: Application = {
        ...current,
        status: decision.to,
        updatedAt: now,
      };

      if (request.action !== 'cancel') {
        next.reviewerId = actor.id;
        next.reviewedAt = now;
      }
      if (reason) {
        next.rejectionReason = reason;
      }

      await tx.saveApplication(next);
    });

    const updated = await this.requireApplication(applicationId);

    logger.info('Application transitioned', {
      applicationId,
      from: snapshot.status,
      to: updated.status,
    });

    return updated;
  }

  approve(applicationId: string, actorId: string, role: ActorRole): Promise<Application> {
    return this.transition(applicationId, { id: actorId, role }, { action: 'approve' });
  }

  reject(applicationId: string, actorId: string, role: ActorRole, reason: string): Promise<Application> {
    return this.transition(applicationId, { id: actorId, role }, { action: 'reject', reason });
  }

  cancel(applicationId: string, actorId: string, role: ActorRole): Promise<Application> {
    return this.transition(applicationId, { id: actorId, role }, { action: 'cancel' });
  }

  async getApplication(id: string): Promise<Application> {
    logger.debug('Getting application', { id });
    return this.requireApplication(id);
  }

  /**
   * Application with venue summary, per-line stock status and the actions
   * the viewer may take. Members may only view their own applications.
   */
  async getApplicationDetails(id: string, viewer: Actor): Promise<ApplicationDetails> {
    const application = await this.requireApplication(id);

    if (authorityOf(viewer.role) === 'member' && application.requesterId !== viewer.id) {
      throw new AppError(
        ErrorCode.PERMISSION_DENIED,
        'Members may only view their own applications',
        403
      );
    }

    const venue = await this.store.findVenueById(application.venueId);

    const lineItems: LineItemDetail[] = [];
    for (const item of application.lineItems) {
      const material = await this.store.findMaterialById(item.materialId);
      if (!material) continue;

      lineItems.push({
        materialId: material.id,
        materialName: material.name,
        unit: material.unit,
        requestedQuantity: item.quantity,
        availableQuantity: material.availableQuantity,
        totalQuantity: material.totalQuantity,
        stockStatus: stockStatus(material, item.quantity),
      });
    }

    return {
      ...application,
      venue: venue && {
        id: venue.id,
        name: venue.name,
        location: venue.location,
        capacity: venue.capacity,
        status: venue.status,
      },
      lineItems,
      availableActions: legalActions(application, viewer),
    };
  }

  async listApplicationsByRequester(
    requesterId: string,
    statusFilter?: ApplicationStatus
  ): Promise<Application[]> {
    logger.debug('Listing applications by requester', { requesterId, statusFilter });

    return this.store.listApplications({
      requesterId,
      ...(statusFilter && { statuses: [statusFilter] }),
    });
  }

  /**
   * Review queue for a role: reviewers see pending_reviewer, admins see
   * pending_admin, members have none
   */
  async listPendingForRole(role: ActorRole): Promise<Application[]> {
    const status = reviewQueueFor(role);
    logger.debug('Listing pending applications', { role, status });
    return this.store.listApplications({ statuses: [status] });
  }

  /**
   * Venues that are not under maintenance and have no active booking
   * overlapping [startTime, endTime)
   */
  async queryAvailableVenues(startTime: Date, endTime: Date): Promise<Venue[]> {
    this.validateInterval(startTime, endTime);

    const detector = new ConflictDetector(this.store);
    const venues = await this.store.listVenues('available');
    const free: Venue[] = [];

    for (const venue of venues) {
      if (!(await detector.hasConflict(venue.id, startTime, endTime))) {
        free.push(venue);
      }
    }

    return free;
  }

  private validateCreateInput(input: CreateApplicationInput): void {
    if (!input.requesterId.trim()) {
      throw validationError('Requester ID is required');
    }
    if (!input.venueId.trim()) {
      throw validationError('Venue ID is required');
    }
    if (!input.activityName.trim()) {
      throw validationError('Activity name is required');
    }

    this.validateInterval(input.startTime, input.endTime);

    if (input.startTime.getTime() <= this.clock().getTime()) {
      throw validationError('Start time must be in the future', {
        startTime: input.startTime.toISOString(),
      });
    }

    if (input.lineItems.length === 0) {
      throw validationError('At least one material must be requested');
    }

    const seen = new Set<string>();
    for (const item of input.lineItems) {
      if (!item.materialId.trim()) {
        throw validationError('Material ID is required');
      }
      if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
        throw validationError('Material quantity must be a positive integer', {
          materialId: item.materialId,
          quantity: item.quantity,
        });
      }
      if (seen.has(item.materialId)) {
        throw validationError('Each material may only be requested once', {
          materialId: item.materialId,
        });
      }
      seen.add(item.materialId);
    }
  }

  private validateInterval(startTime: Date, endTime: Date): void {
    if (!isValidDate(startTime) || !isValidDate(endTime)) {
      throw validationError('Start and end times must be valid dates');
    }
    if (startTime.getTime() >= endTime.getTime()) {
      throw validationError('Start time must be before end time', {
        startTime: startTime.toISOString(),
        endTime: endTime.toISOString(),
      });
    }
  }

  /**
   * Approval-time guard against changes made since submission
   */
  private async recheckHold(tx: StoreTransaction, application: Application): Promise<void> {
    const venue = await this.requireVenue(tx, application.venueId);
    this.assertVenueBookable(venue);

    const conflict = await new ConflictDetector(tx).findConflict(
      application.venueId,
      application.startTime,
      application.endTime,
      application.id
    );
    if (conflict) {
      throw new AppError(
        ErrorCode.SCHEDULING_CONFLICT,
        `Application ${conflict.id} now overlaps this booking`,
        409,
        { conflictingApplicationId: conflict.id }
      );
    }

    for (const item of application.lineItems) {
      const material = await tx.getMaterial(item.materialId);
      if (!material || material.status !== 'available') {
        throw new AppError(
          ErrorCode.RESOURCE_UNAVAILABLE,
          `Material ${material?.name ?? item.materialId} is currently unavailable`,
          409,
          { materialId: item.materialId }
        );
      }
    }
  }

  private assertVenueBookable(venue: Venue): void {
    if (venue.status !== 'available') {
      throw new AppError(
        ErrorCode.RESOURCE_UNAVAILABLE,
        `Venue ${venue.name} is under ${venue.status}`,
        409,
        { venueId: venue.id, status: venue.status }
      );
    }
  }

  private async requireVenue(tx: StoreTransaction, venueId: string): Promise<Venue> {
    const venue = await tx.getVenue(venueId);

    if (!venue) {
      throw new AppError(ErrorCode.VENUE_NOT_FOUND, `Venue with ID ${venueId} not found`, 404);
    }

    return venue;
  }

  private async requireApplication(id: string): Promise<Application> {
    const application = await this.store.findApplicationById(id);

    if (!application) {
      throw this.applicationNotFound(id);
    }

    return application;
  }

  private applicationNotFound(id: string): AppError {
    return new AppError(
      ErrorCode.APPLICATION_NOT_FOUND,
      `Application with ID ${id} not found`,
      404
    );
  }
}
