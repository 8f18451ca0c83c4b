import { Request } from 'express';
import { AnyZodObject, z } from 'zod';

/**
 * Typed request data (body, params, query) for a schema
 *
 * Routes run validate() with the same schema first, so this only fails for
 * a handler mounted without it; the ZodError then reaches the global error
 * handler as a 400.
 *
 * Usage:
 * ```typescript
 * const { body } = parseRequest(createVenueSchema, req);
 * ```
 */
export function parseRequest<S extends AnyZodObject>(schema: S, req: Request): z.infer<S> {
  return schema.parse({
    body: req.body,
    params: req.params,
    query: req.query,
  });
}
