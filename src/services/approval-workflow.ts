import type { Actor, ActorRole, Authority } from '../types/actor.types';
import { authorityOf } from '../types/actor.types';
import type {
  Application,
  ApplicationStatus,
  WorkflowAction,
} from '../types/application.types';
import { AppError, ErrorCode } from '../types/error.types';

/**
 * Approval Workflow
 *
 * The approval chain as data. Ordinary members enter at the reviewer tier;
 * privileged roles enter at the admin tier. Admin carries reviewer authority,
 * reviewer never carries admin authority.
 *
 * | From                                  | Who                | Action  | To               | Effect       |
 * |---------------------------------------|--------------------|---------|------------------|--------------|
 * | pending_reviewer                      | reviewer, admin    | approve | pending_admin    | retain_hold  |
 * | pending_admin                         | admin              | approve | approved         | retain_hold  |
 * | pending_reviewer                      | reviewer, admin    | reject  | rejected         | release_hold |
 * | pending_admin                         | admin              | reject  | rejected         | release_hold |
 * | pending_reviewer/pending_admin/approved | requester, admin | cancel  | cancelled        | release_hold |
 */

export type TransitionEffect = 'retain_hold' | 'release_hold';

// How an actor relates to an application: their authority tier, or being its requester
export type ActorRelation = Authority | 'requester';

export interface TransitionRule {
  from: ApplicationStatus;
  action: WorkflowAction;
  allowed: readonly ActorRelation[];
  to: ApplicationStatus;
  effect: TransitionEffect;
}

export interface TransitionDecision {
  from: ApplicationStatus;
  to: ApplicationStatus;
  effect: TransitionEffect;
}

export const TRANSITION_TABLE: readonly TransitionRule[] = [
  { from: 'pending_reviewer', action: 'approve', allowed: ['reviewer', 'admin'], to: 'pending_admin', effect: 'retain_hold' },
  { from: 'pending_admin', action: 'approve', allowed: ['admin'], to: 'approved', effect: 'retain_hold' },
  { from: 'pending_reviewer', action: 'reject', allowed: ['reviewer', 'admin'], to: 'rejected', effect: 'release_hold' },
  { from: 'pending_admin', action: 'reject', allowed: ['admin'], to: 'rejected', effect: 'release_hold' },
  { from: 'pending_reviewer', action: 'cancel', allowed: ['requester', 'admin'], to: 'cancelled', effect: 'release_hold' },
  { from: 'pending_admin', action: 'cancel', allowed: ['requester', 'admin'], to: 'cancelled', effect: 'release_hold' },
  { from: 'approved', action: 'cancel', allowed: ['requester', 'admin'], to: 'cancelled', effect: 'release_hold' },
];

// No outgoing transitions at all
export const FINAL_STATUSES: readonly ApplicationStatus[] = ['rejected', 'cancelled'];

const INITIAL_STATUS: Record<Authority, ApplicationStatus> = {
  member: 'pending_reviewer',
  reviewer: 'pending_admin',
  admin: 'pending_admin',
};

// The queue each privileged tier works from
const REVIEW_QUEUE: Record<Authority, ApplicationStatus | null> = {
  member: null,
  reviewer: 'pending_reviewer',
  admin: 'pending_admin',
};

export function isFinalStatus(status: ApplicationStatus): boolean {
  return FINAL_STATUSES.includes(status);
}

/**
 * Status a freshly submitted application starts in
 */
export function initialStatusFor(role: ActorRole): ApplicationStatus {
  return INITIAL_STATUS[authorityOf(role)];
}

export function reviewQueueFor(role: ActorRole): ApplicationStatus {
  const queue = REVIEW_QUEUE[authorityOf(role)];

  if (!queue) {
    throw new AppError(
      ErrorCode.PERMISSION_DENIED,
      `Role ${role} has no approval queue`,
      403,
      { role }
    );
  }

  return queue;
}

export function relationsOf(actor: Actor, application: Application): ActorRelation[] {
  const relations: ActorRelation[] = [authorityOf(actor.role)];
  if (actor.id === application.requesterId) {
    relations.push('requester');
  }
  return relations;
}

const findRule = (
  application: Application,
  actor: Actor,
  action: WorkflowAction
): TransitionRule | undefined => {
  const relations = relationsOf(actor, application);
  return TRANSITION_TABLE.find(
    (rule) =>
      rule.from === application.status &&
      rule.action === action &&
      rule.allowed.some((relation) => relations.includes(relation))
  );
};

/**
 * Decide the outcome of `action` by `actor` on `application`.
 *
 * Throws:
 * - INVALID_STATE_TRANSITION if no rule leaves the current status via `action`
 * - PERMISSION_DENIED if rules exist but none admits this actor
 */
export function decideTransition(
  application: Application,
  actor: Actor,
  action: WorkflowAction
): TransitionDecision {
  const candidates = TRANSITION_TABLE.filter(
    (rule) => rule.from === application.status && rule.action === action
  );

  if (candidates.length === 0) {
    throw new AppError(
      ErrorCode.INVALID_STATE_TRANSITION,
      `Cannot ${action} an application that is ${application.status}`,
      409,
      { currentStatus: application.status, action }
    );
  }

  const rule = findRule(application, actor, action);

  if (!rule) {
    throw new AppError(
      ErrorCode.PERMISSION_DENIED,
      `Role ${actor.role} may not ${action} an application that is ${application.status}`,
      403,
      { currentStatus: application.status, action, role: actor.role }
    );
  }

  return { from: rule.from, to: rule.to, effect: rule.effect };
}

/**
 * Actions `actor` may currently take on `application`
 */
export function legalActions(application: Application, actor: Actor): WorkflowAction[] {
  const actions: WorkflowAction[] = ['approve', 'reject', 'cancel'];
  return actions.filter((action) => findRule(application, actor, action) !== undefined);
}

/**
 * Every status reachable from `from` through the table (excluding `from`
 * itself unless a cycle leads back to it)
 */
export function reachableStatuses(from: ApplicationStatus): Set<ApplicationStatus> {
  const seen = new Set<ApplicationStatus>();
  const queue: ApplicationStatus[] = [from];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;

    for (const rule of TRANSITION_TABLE) {
      if (rule.from === current && !seen.has(rule.to)) {
        seen.add(rule.to);
        queue.push(rule.to);
      }
    }
  }

  return seen;
}
