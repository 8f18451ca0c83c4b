import { Request, Response, NextFunction, RequestHandler } from 'express';

export type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Adapts an async handler to Express 4, forwarding rejections to the error middleware
 *
 * Usage:
 * ```typescript
 * router.get('/venues/:id', asyncHandler(async (req, res) => {
 *   const venue = await venueService.getVenue(req.params.id);
 *   res.json(createSuccessResponse(venue));
 * }));
 * ```
 */
export const asyncHandler = (fn: AsyncRequestHandler): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};
