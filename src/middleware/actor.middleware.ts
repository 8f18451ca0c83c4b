import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ACTOR_ROLES, Actor } from '../types/actor.types';
import { AppError, ErrorCode } from '../types/error.types';
import { createErrorResponse } from '../utils/response-factory';

/**
 * Caller identity
 *
 * Authentication happens upstream; the gateway forwards the authenticated
 * identity in these headers.
 */
export const ACTOR_ID_HEADER = 'x-actor-id';
export const ACTOR_ROLE_HEADER = 'x-actor-role';

const actorHeadersSchema = z.object({
  [ACTOR_ID_HEADER]: z.string().trim().min(1).max(255),
  [ACTOR_ROLE_HEADER]: z.enum(ACTOR_ROLES),
});

const readActor = (req: Request): Actor | null => {
  const parsed = actorHeadersSchema.safeParse(req.headers);
  if (!parsed.success) return null;

  return {
    id: parsed.data[ACTOR_ID_HEADER],
    role: parsed.data[ACTOR_ROLE_HEADER],
  };
};

/**
 * Rejects requests without a well-formed identity
 */
export const requireActor = (req: Request, res: Response, next: NextFunction): void => {
  if (!readActor(req)) {
    res
      .status(401)
      .json(
        createErrorResponse(
          ErrorCode.UNAUTHENTICATED,
          `Missing or invalid ${ACTOR_ID_HEADER} / ${ACTOR_ROLE_HEADER} headers`
        )
      );
    return;
  }
  next();
};

/**
 * Identity of the caller, for handlers mounted behind `requireActor`
 */
export const actorOf = (req: Request): Actor => {
  const actor = readActor(req);

  if (!actor) {
    throw new AppError(ErrorCode.UNAUTHENTICATED, 'Caller identity is missing', 401);
  }

  return actor;
};
