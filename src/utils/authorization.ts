import type { Actor } from '../types/actor.types';
import { isAdmin } from '../types/actor.types';
import { AppError, ErrorCode } from '../types/error.types';

/**
 * Catalog maintenance is reserved for admin-tier roles
 */
export function assertAdmin(actor: Actor, operation: string): void {
  if (!isAdmin(actor.role)) {
    throw new AppError(
      ErrorCode.PERMISSION_DENIED,
      `Role ${actor.role} may not ${operation}`,
      403,
      { role: actor.role }
    );
  }
}
