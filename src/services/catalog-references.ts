import type { Application } from '../types/application.types';
import { isActiveStatus } from '../types/application.types';
import { AppError, ErrorCode } from '../types/error.types';

/**
 * Refuse to delete a catalog row that applications still point at.
 *
 * Active applications hold it. Finished ones keep it as part of their
 * history, so the row can only be taken out of service.
 */
export function assertUnreferenced(
  resource: 'venue' | 'material',
  id: string,
  applications: readonly Application[]
): void {
  if (applications.length === 0) return;

  const active = applications.filter((application) => isActiveStatus(application.status));
  const message =
    active.length > 0
      ? `The ${resource} is held by ${active.length} active application(s)`
      : `The ${resource} appears in past applications; take it out of service instead`;

  throw new AppError(ErrorCode.RESOURCE_UNAVAILABLE, message, 409, {
    resource,
    id,
    activeApplicationIds: active.map((application) => application.id),
    applicationCount: applications.length,
  });
}
