/**
 * Application (reservation request) domain types
 */

import type { ActorRole } from './actor.types';
import type { StockStatus } from './material.types';
import type { VenueSummary } from './venue.types';

export const APPLICATION_STATUSES = [
  'pending_reviewer',
  'pending_admin',
  'approved',
  'rejected',
  'cancelled',
] as const;

export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

// Statuses that hold the venue interval and the reserved inventory
export const ACTIVE_STATUSES: readonly ApplicationStatus[] = [
  'pending_reviewer',
  'pending_admin',
  'approved',
];

export interface LineItem {
  materialId: string;
  quantity: number;
}

export interface Application {
  id: string;
  requesterId: string;
  activityName: string;
  activityDescription: string;
  venueId: string;
  startTime: Date;
  endTime: Date;
  lineItems: LineItem[];
  status: ApplicationStatus;
  reviewerId?: string;
  rejectionReason?: string;
  version: number;
  createdAt: Date;
  reviewedAt?: Date;
  updatedAt: Date;
}

// Database row types (snake_case from PostgreSQL)
export interface LineItemRow {
  application_id: string;
  position: number;
  material_id: string;
  quantity: number;
}

export interface ApplicationRow {
  id: string;
  requester_id: string;
  activity_name: string;
  activity_description: string;
  venue_id: string;
  start_time: string;
  end_time: string;
  status: string;
  reviewer_id: string | null;
  rejection_reason: string | null;
  version: number;
  created_at: string;
  reviewed_at: string | null;
  updated_at: string;
  application_line_items: LineItemRow[] | null;
}

// Create application input
export interface CreateApplicationInput {
  requesterId: string;
  requesterRole: ActorRole;
  venueId: string;
  startTime: Date;
  endTime: Date;
  lineItems: LineItem[];
  activityName: string;
  activityDescription?: string;
}

// Workflow requests, one per mutation kind
export interface ApproveRequest {
  action: 'approve';
}

export interface RejectRequest {
  action: 'reject';
  reason: string;
}

export interface CancelRequest {
  action: 'cancel';
}

export type TransitionRequest = ApproveRequest | RejectRequest | CancelRequest;

export type WorkflowAction = TransitionRequest['action'];

export interface ApplicationFilter {
  requesterId?: string;
  venueId?: string;
  statuses?: readonly ApplicationStatus[];
}

export interface LineItemDetail {
  materialId: string;
  materialName: string;
  unit: string;
  requestedQuantity: number;
  availableQuantity: number;
  totalQuantity: number;
  stockStatus: StockStatus;
}

export interface ApplicationDetails extends Omit<Application, 'lineItems'> {
  venue: VenueSummary | null;
  lineItems: LineItemDetail[];
  // Workflow actions the viewing actor may take right now
  availableActions: WorkflowAction[];
}

export function isActiveStatus(status: ApplicationStatus): boolean {
  return ACTIVE_STATUSES.includes(status);
}
