/**
 * calendar.ts
 *
 * Maps merged events to iCalendar text.
 *
 * Start times already carry the fixed correction applied by the geometry decoder,
 * so their wall-clock fields are written out as UTC unchanged.
 */

import { createHash } from 'node:crypto';
import type { EventAttributes } from 'ics';
import { createEvents } from 'ics';
import { CalendarAssemblyError } from './errors';
import type { CalendarEvent } from './types';

export type CalendarOptions = {
  productId: string;
};

// Same block scraped on the next run gets the same UID, so subscribers update in place.
export function eventUid(event: CalendarEvent): string {
  const key = [event.start.toFormat("yyyyMMdd'T'HHmm"), event.course, event.room].join('|');
  return `${createHash('sha1').update(key).digest('hex')}@timetable`;
}

// ORGANIZER needs a calendar address, which the grid never shows, so the instructor goes here.
function describe(event: CalendarEvent): string {
  const lines = [event.instructor];
  if (event.groups.length > 0) lines.push(event.groups.join(', '));
  lines.push(event.notes);
  return lines.join('\n');
}

export function toEventAttributes(event: CalendarEvent, opts: CalendarOptions): EventAttributes {
  const { start } = event;
  return {
    uid: eventUid(event),
    productId: opts.productId,
    title: event.course,
    location: event.room,
    description: describe(event),
    ...(event.groups.length > 0 ? { categories: [...event.groups] } : {}),
    start: [start.year, start.month, start.day, start.hour, start.minute],
    startInputType: 'utc',
    startOutputType: 'utc',
    duration: { hours: Math.floor(event.durationMinutes / 60), minutes: event.durationMinutes % 60 },
  };
}

export function buildCalendar(events: CalendarEvent[], opts: CalendarOptions): string {
  const { error, value } = createEvents(events.map((e) => toEventAttributes(e, opts)));
  if (error || !value) {
    throw new CalendarAssemblyError(`iCalendar generation failed: ${error?.message ?? 'no output'}`, { cause: error });
  }
  return value;
}
