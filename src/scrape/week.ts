/**
 * week.ts
 *
 * Week targets for one run. Targets are built by stepping whole weeks from the
 * injected "now", so the ISO week number and year come from the real calendar
 * (52 or 53 rolls over to 1) and weekDelta is simply the step count.
 */

import type { DateTime } from 'luxon';
import type { WeekTarget } from './types';

// Text the pagination control shows for a week, e.g. "(43)".
export function weekLabel(isoWeek: number): string {
  return `(${isoWeek})`;
}

export function buildWeekTargets(now: DateTime, weekCount: number): WeekTarget[] {
  return Array.from({ length: weekCount }, (_, weekDelta) => {
    const day = now.plus({ weeks: weekDelta });
    return {
      isoWeek: day.weekNumber,
      weekYear: day.weekYear,
      weekDelta,
      isCurrentWeek: weekDelta === 0,
      label: weekLabel(day.weekNumber),
    };
  });
}
