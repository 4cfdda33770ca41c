/**
 * geometry.ts
 *
 * Turns pixel layout into time. The page carries no timestamps: an event's day
 * comes from its x offset, its start from its y offset and its length from the
 * block height, all measured against the grid container.
 */

import type { DateTime } from 'luxon';
import { ContainerUnavailableError, GeometryOutOfRangeError } from './errors';
import type { ContainerDimensions, DecodedGeometry, GridContainer, GridLayout, RawCell } from './types';

export const SLOT_MINUTES = 30;

export const DEFAULT_LAYOUT: GridLayout = {
  dayCount: 7,
  startHour: 7,
  endHour: 21,
  timezoneCorrectionMinutes: 60,
};

export function halfHourSlots(layout: GridLayout): number {
  return (layout.endHour - layout.startHour) * 2;
}

export function dayPx(container: GridContainer): number {
  return container.widthPx / container.layout.dayCount;
}

export function halfHourPx(container: GridContainer): number {
  return container.heightPx / halfHourSlots(container.layout);
}

export function makeGridContainer(dims: ContainerDimensions, layout: GridLayout): GridContainer {
  const { widthPx, heightPx } = dims;
  if (!Number.isFinite(widthPx) || !Number.isFinite(heightPx) || widthPx <= 0 || heightPx <= 0) {
    throw new ContainerUnavailableError(`grid container has unusable size ${widthPx}x${heightPx}`);
  }
  return { widthPx, heightPx, layout };
}

// Monday of the ISO week containing `now`, at the grid's first hour.
export function weekAnchor(now: DateTime, layout: GridLayout): DateTime {
  return now.startOf('week').set({ hour: layout.startHour, minute: 0, second: 0, millisecond: 0 });
}

// No bounds checks here: see checkGeometry.
export function decodeCell(
  container: GridContainer,
  cell: Pick<RawCell, 'xPx' | 'yPx' | 'blockHeightPx'>,
  weekDelta: number,
  anchor: DateTime,
): DecodedGeometry {
  const slotPx = halfHourPx(container);

  const weekdayOffset = Math.trunc(cell.xPx / dayPx(container));
  const timeOffsetMinutes = Math.trunc(cell.yPx / slotPx) * SLOT_MINUTES;
  const durationMinutes = Math.trunc(cell.blockHeightPx / slotPx) * SLOT_MINUTES;

  const start = anchor
    .plus({ days: weekdayOffset + weekDelta * 7 })
    .plus({ minutes: timeOffsetMinutes - container.layout.timezoneCorrectionMinutes });

  return { weekdayOffset, timeOffsetMinutes, durationMinutes, start };
}

export function assertFiniteCell(cell: Pick<RawCell, 'xPx' | 'yPx' | 'blockHeightPx'>): void {
  const { xPx, yPx, blockHeightPx } = cell;
  if (![xPx, yPx, blockHeightPx].every(Number.isFinite)) {
    throw new GeometryOutOfRangeError('cell position or height could not be read', { xPx, yPx, blockHeightPx });
  }
  // truncation would turn small negative offsets into day 0 / slot 0
  if (xPx < 0 || yPx < 0) {
    throw new GeometryOutOfRangeError('cell is positioned outside the grid', { xPx, yPx, blockHeightPx });
  }
}

export function checkGeometry(container: GridContainer, decoded: DecodedGeometry): void {
  const { weekdayOffset, timeOffsetMinutes, durationMinutes } = decoded;
  const gridMinutes = halfHourSlots(container.layout) * SLOT_MINUTES;
  const context = { weekdayOffset, timeOffsetMinutes, durationMinutes };

  if (weekdayOffset < 0 || weekdayOffset >= container.layout.dayCount) {
    throw new GeometryOutOfRangeError(`weekday offset ${weekdayOffset} is outside the grid`, context);
  }
  if (timeOffsetMinutes < 0 || timeOffsetMinutes >= gridMinutes) {
    throw new GeometryOutOfRangeError(`start offset ${timeOffsetMinutes} min is outside the grid`, context);
  }
  if (durationMinutes <= 0) {
    throw new GeometryOutOfRangeError(`block is shorter than one slot`, context);
  }
  if (timeOffsetMinutes + durationMinutes > gridMinutes) {
    throw new GeometryOutOfRangeError(`block runs past the end of the grid`, context);
  }
}
