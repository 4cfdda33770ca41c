/**
 * worker.ts
 *
 * Scrapes one week on its own page session:
 * - pages forward to the target week unless it is the current one
 * - reads the raw cells (zero cells means no events that week)
 * - decodes geometry and parses text per cell, skipping bad cells
 *
 * Failures before the cell loop fail this week only; the orchestrator never sees a throw.
 */

import type { DateTime } from 'luxon';
import { assertFiniteCell, checkGeometry, decodeCell } from './geometry';
import { parseEventText } from './eventText';
import { describeError, isCellError, toError } from './errors';
import { logDebug, logInfo, logWarn, weekScope } from './log';
import type {
  CalendarEvent,
  CellFailure,
  GridContainer,
  PageAccessor,
  RawCell,
  WeekOutcome,
  WeekTarget,
} from './types';

export type WeekContext = {
  container: GridContainer;
  anchor: DateTime;
};

export function cellToEvent(ctx: WeekContext, cell: RawCell, weekDelta: number): CalendarEvent {
  assertFiniteCell(cell);
  const decoded = decodeCell(ctx.container, cell, weekDelta, ctx.anchor);
  checkGeometry(ctx.container, decoded);

  const record = parseEventText(cell.textBlob);

  return {
    start: decoded.start,
    durationMinutes: decoded.durationMinutes,
    course: record.course,
    room: record.room,
    instructor: record.instructor,
    groups: record.groups,
    notes: record.notes,
  };
}

export async function scrapeWeek(page: PageAccessor, ctx: WeekContext, week: WeekTarget): Promise<WeekOutcome> {
  const scope = weekScope(week.isoWeek);

  try {
    if (!week.isCurrentWeek) {
      logDebug(`activating pagination control ${week.label}`, scope);
      await page.activateWeek(week.label);
    }

    const cells = await page.listEventCells();
    if (cells.length === 0) {
      logInfo('no events this week', scope);
      return { ok: true, week, events: [], skipped: [] };
    }

    const events: CalendarEvent[] = [];
    const skipped: CellFailure[] = [];

    cells.forEach((cell, index) => {
      try {
        events.push(cellToEvent(ctx, cell, week.weekDelta));
      } catch (err) {
        if (!isCellError(err)) throw err;
        skipped.push({ index, error: err });
        logWarn(`skipping cell ${index}: ${describeError(err)}`, scope);
      }
    });

    logInfo(`parsed ${events.length} event(s), skipped ${skipped.length}`, scope);
    return { ok: true, week, events, skipped };
  } catch (err) {
    logWarn(`week failed: ${describeError(err)}`, scope);
    return { ok: false, week, error: toError(err) };
  }
}
