import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';
import { ACTOR_ID_HEADER, ACTOR_ROLE_HEADER } from './actor.middleware';

const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Request logging middleware
 *
 * Tags each request with an id (echoed back in `x-request-id`) and logs it
 * with the acting identity. Request bodies are not logged.
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();
  const requestId = req.header(REQUEST_ID_HEADER) ?? randomUUID();

  res.setHeader(REQUEST_ID_HEADER, requestId);

  logger.info('Incoming request', {
    requestId,
    method: req.method,
    path: req.path,
    query: req.query,
    actorId: req.header(ACTOR_ID_HEADER),
    actorRole: req.header(ACTOR_ROLE_HEADER),
  });

  res.on('finish', () => {
    logger.log(res.statusCode >= 500 ? 'error' : 'info', 'Outgoing response', {
      requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: `${Date.now() - startTime}ms`,
    });
  });

  next();
};
