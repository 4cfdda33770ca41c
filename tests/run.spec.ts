import { test, expect } from '@playwright/test';
import { DateTime } from 'luxon';
import { DEFAULT_LAYOUT } from '../src/scrape/geometry';
import {
  ContainerUnavailableError,
  InvalidWeekCountError,
  PaginationNotFoundError,
  WeekTimeoutError,
} from '../src/scrape/errors';
import { mergeOutcomes, runScrape } from '../src/scrape/run';
import type { ScrapeOptions } from '../src/scrape/run';
import type { CalendarEvent, WeekOutcome } from '../src/scrape/types';
import { blob, cell, fakeSessions } from './fakes';
import type { FakeTimetable, FakeWeek } from './fakes';

// Monday of ISO week 43, 2026
const now = DateTime.fromISO('2026-10-19T09:15:00', { zone: 'utc' });

const options = (overrides: Partial<ScrapeOptions> = {}): ScrapeOptions => ({
  weekCount: 5,
  concurrency: 3,
  weekTimeoutMs: 5_000,
  layout: DEFAULT_LAYOUT,
  now,
  ...overrides,
});

const algorithms = cell(250, 100, 60, blob('Algorithms', 'B204', 'Dr. Martin', 'TD1', 'Bring laptop'));
const networks = cell(0, 0, 40, blob('Networks', 'A1', 'Dr. Cole', 'Quiz'));

const keys = (events: CalendarEvent[]) =>
  events.map((e) => `${e.course}@${e.start.toFormat('yyyy-MM-dd HH:mm')}`).sort();

function fiveWeeks(overrides: Record<string, FakeWeek> = {}): FakeTimetable {
  return {
    container: { widthPx: 700, heightPx: 560 },
    currentLabel: '(43)',
    weeks: {
      '(43)': [networks],
      '(44)': [algorithms],
      '(45)': [networks, algorithms],
      '(46)': [networks],
      '(47)': [algorithms],
      ...overrides,
    },
  };
}

test.describe('runScrape', () => {
  test('merges every week into one event list', async () => {
    const sessions = fakeSessions(fiveWeeks());
    const report = await runScrape(sessions, options());

    expect(keys(report.events)).toEqual([
      'Algorithms@2026-10-28 08:30',
      'Algorithms@2026-11-04 08:30',
      'Algorithms@2026-11-18 08:30',
      'Networks@2026-10-19 06:00',
      'Networks@2026-11-02 06:00',
      'Networks@2026-11-09 06:00',
    ]);
    expect(report.weeks.map((w) => [w.week.isoWeek, w.ok])).toEqual([
      [43, true],
      [44, true],
      [45, true],
      [46, true],
      [47, true],
    ]);
  });

  test('the current week stays on the primary page; other weeks get their own sessions', async () => {
    const sessions = fakeSessions(fiveWeeks());
    await runScrape(sessions, options());

    expect(sessions.opened).toBe(5);
    expect(sessions.closed).toBe(5);
    expect([...sessions.activated].sort()).toEqual(['(44)', '(45)', '(46)', '(47)']);
  });

  test('a failed week 3 of 5 is dropped and reported, the rest survive', async () => {
    const sessions = fakeSessions(fiveWeeks({ '(45)': 'no-pagination' }));
    const report = await runScrape(sessions, options());

    expect(keys(report.events)).toEqual([
      'Algorithms@2026-10-28 08:30',
      'Algorithms@2026-11-18 08:30',
      'Networks@2026-10-19 06:00',
      'Networks@2026-11-09 06:00',
    ]);
    const third = report.weeks[2];
    expect(third.week.isoWeek).toBe(45);
    expect(third.ok).toBe(false);
    if (third.ok) return;
    expect(third.error).toBeInstanceOf(PaginationNotFoundError);
  });

  test('a week with no cells contributes nothing and does not disturb the others', async () => {
    const sessions = fakeSessions(fiveWeeks({ '(44)': [] }));
    const report = await runScrape(sessions, options());

    expect(report.weeks[1]).toMatchObject({ ok: true, events: [], skipped: [] });
    expect(report.events).toHaveLength(5);
  });

  test('a stuck week times out on its own', async () => {
    const sessions = fakeSessions(fiveWeeks({ '(46)': { hangMs: 400 } }));
    const report = await runScrape(sessions, options({ weekTimeoutMs: 50 }));

    const stuck = report.weeks[3];
    expect(stuck.ok).toBe(false);
    if (stuck.ok) return;
    expect(stuck.error).toBeInstanceOf(WeekTimeoutError);
    expect(report.weeks.filter((w) => w.ok)).toHaveLength(4);
  });

  test('never runs more weeks at once than the pool allows', async () => {
    const sessions = fakeSessions({ ...fiveWeeks(), delayMs: 20 });
    await runScrape(sessions, options({ concurrency: 2 }));

    expect(sessions.peakInFlight).toBeGreaterThan(0);
    expect(sessions.peakInFlight).toBeLessThanOrEqual(2);
  });

  test('a failing container read is fatal', async () => {
    const sessions = fakeSessions({ ...fiveWeeks(), container: new Error('grid not rendered') });

    await expect(runScrape(sessions, options())).rejects.toThrow(ContainerUnavailableError);
    expect(sessions.opened).toBe(1);
    expect(sessions.closed).toBe(1);
  });

  test('a zero-sized container is fatal', async () => {
    const sessions = fakeSessions({ ...fiveWeeks(), container: { widthPx: 0, heightPx: 560 } });
    await expect(runScrape(sessions, options())).rejects.toThrow(ContainerUnavailableError);
  });

  test('rejects a non-positive week count before touching the page', async () => {
    const sessions = fakeSessions(fiveWeeks());

    await expect(runScrape(sessions, options({ weekCount: 0 }))).rejects.toThrow(InvalidWeekCountError);
    expect(sessions.opened).toBe(0);
  });
});

test.describe('mergeOutcomes', () => {
  test('the merged set does not depend on outcome order', async () => {
    const report = await runScrape(fakeSessions(fiveWeeks({ '(45)': 'no-pagination' })), options());
    const forward: WeekOutcome[] = report.weeks;
    const reversed = [...forward].reverse();
    const rotated = [...forward.slice(2), ...forward.slice(0, 2)];

    const expected = keys(mergeOutcomes(forward));
    expect(keys(mergeOutcomes(reversed))).toEqual(expected);
    expect(keys(mergeOutcomes(rotated))).toEqual(expected);
    expect(expected).toHaveLength(4);
  });
});
