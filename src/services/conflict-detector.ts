import type { Application } from '../types/application.types';
import { isActiveStatus } from '../types/application.types';
import type { ActiveApplicationReader, TimeWindow } from '../repositories/store.types';

/**
 * Closed-open interval overlap: [s1, e1) and [s2, e2) are disjoint iff
 * e1 <= s2 or s1 >= e2. Back-to-back bookings therefore do not conflict.
 */
export function intervalsOverlap(a: TimeWindow, b: TimeWindow): boolean {
  const disjoint =
    a.endTime.getTime() <= b.startTime.getTime() || a.startTime.getTime() >= b.endTime.getTime();
  return !disjoint;
}

/**
 * Conflict Detector
 *
 * Pure query over active applications on a venue. Run inside the caller's
 * store transaction when the answer gates a write.
 */
export class ConflictDetector {
  constructor(private reader: ActiveApplicationReader) {}

  /**
   * First active application on the venue overlapping [startTime, endTime),
   * ignoring `excludeApplicationId`
   */
  async findConflict(
    venueId: string,
    startTime: Date,
    endTime: Date,
    excludeApplicationId?: string
  ): Promise<Application | null> {
    const window = { startTime, endTime };
    const candidates = await this.reader.listActiveApplicationsForVenue(venueId, window);

    const blocking = candidates
      .filter((app) => app.venueId === venueId)
      .filter((app) => app.id !== excludeApplicationId)
      .filter((app) => isActiveStatus(app.status))
      .filter((app) => intervalsOverlap(app, window))
      .sort((a, b) => a.startTime.getTime() - b.startTime.getTime());

    return blocking[0] ?? null;
  }

  async hasConflict(
    venueId: string,
    startTime: Date,
    endTime: Date,
    excludeApplicationId?: string
  ): Promise<boolean> {
    return (await this.findConflict(venueId, startTime, endTime, excludeApplicationId)) !== null;
  }
}
