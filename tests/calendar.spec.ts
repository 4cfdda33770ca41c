import { test, expect } from '@playwright/test';
import { DateTime } from 'luxon';
import { buildCalendar, eventUid, toEventAttributes } from '../src/scrape/calendar';
import type { CalendarEvent } from '../src/scrape/types';

const algorithms: CalendarEvent = {
  start: DateTime.fromISO('2026-10-21T08:30:00', { zone: 'utc' }),
  durationMinutes: 90,
  course: 'Algorithms',
  room: 'B204',
  instructor: 'Dr. Martin',
  groups: ['TD1'],
  notes: 'Bring laptop',
};

const opts = { productId: 'timetable-test' };

test.describe('toEventAttributes', () => {
  test('maps fields onto an iCalendar event', () => {
    const attrs = toEventAttributes(algorithms, opts);

    expect(attrs).toMatchObject({
      title: 'Algorithms',
      location: 'B204',
      categories: ['TD1'],
      description: 'Dr. Martin\nTD1\nBring laptop',
      start: [2026, 10, 21, 8, 30],
      startInputType: 'utc',
      startOutputType: 'utc',
      duration: { hours: 1, minutes: 30 },
      productId: 'timetable-test',
    });
  });

  test('leaves categories out when there are no groups', () => {
    const attrs = toEventAttributes({ ...algorithms, groups: [] }, opts);
    expect(attrs.description).toBe('Dr. Martin\nBring laptop');
    expect('categories' in attrs).toBe(false);
    expect('organizer' in attrs).toBe(false);
  });
});

test.describe('eventUid', () => {
  test('is stable for the same slot and changes with the room', () => {
    const uid = eventUid(algorithms);

    expect(uid).toMatch(/^[0-9a-f]{40}@timetable$/);
    expect(eventUid({ ...algorithms, notes: 'Exam' })).toBe(uid);
    expect(eventUid({ ...algorithms, room: 'B205' })).not.toBe(uid);
  });
});

test.describe('buildCalendar', () => {
  test('writes one VEVENT per event with UTC start times', () => {
    const networks: CalendarEvent = {
      ...algorithms,
      start: DateTime.fromISO('2026-10-19T06:00:00', { zone: 'utc' }),
      durationMinutes: 60,
      course: 'Networks',
    };
    const ics = buildCalendar([algorithms, networks], opts);

    expect(ics).toContain('BEGIN:VCALENDAR');
    expect(ics.match(/BEGIN:VEVENT/g)).toHaveLength(2);
    expect(ics).toContain('SUMMARY:Algorithms');
    expect(ics).toContain('20261021T083000Z');
    expect(ics).toContain('20261019T060000Z');
  });

  test('writes no ORGANIZER line and no empty CATEGORIES line', () => {
    const lines = buildCalendar([algorithms, { ...algorithms, course: 'Networks', groups: [] }], opts).split('\r\n');

    expect(lines.filter((l) => l.startsWith('CATEGORIES'))).toEqual(['CATEGORIES:TD1']);
    expect(lines.filter((l) => l.startsWith('ORGANIZER'))).toEqual([]);
  });
});
