/**
 * run.ts
 *
 * Runs one scrape across consecutive weeks:
 * - opens the primary session and reads the grid container once (fatal if that fails)
 * - builds week targets from the injected "now"
 * - fans out one worker per week through a bounded pool, each with a timeout
 * - joins, merges successful weeks and keeps every outcome as diagnostics
 */

import { DateTime } from 'luxon';
import pLimit from 'p-limit';
import { makeGridContainer, weekAnchor } from './geometry';
import { buildWeekTargets } from './week';
import { scrapeWeek } from './worker';
import type { WeekContext } from './worker';
import {
  ContainerUnavailableError,
  InvalidWeekCountError,
  WeekTimeoutError,
  describeError,
  isScrapeError,
  toError,
} from './errors';
import { logError, logInfo, logWarn, weekScope } from './log';
import type {
  CalendarEvent,
  GridContainer,
  GridLayout,
  PageSession,
  PageSessionFactory,
  ScrapeReport,
  WeekOutcome,
  WeekTarget,
} from './types';

export type ScrapeOptions = {
  weekCount: number;
  concurrency: number;
  weekTimeoutMs: number;
  layout: GridLayout;
  now: DateTime;
};

export function mergeOutcomes(outcomes: WeekOutcome[]): CalendarEvent[] {
  return outcomes.flatMap((o) => (o.ok ? o.events : []));
}

async function withTimeout<T>(work: Promise<T>, ms: number, week: WeekTarget): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new WeekTimeoutError(week.label, ms)), ms);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

async function closeQuietly(session: PageSession, scope: string) {
  try {
    await session.close();
  } catch (err) {
    logWarn(`closing page session failed: ${describeError(err)}`, scope);
  }
}

async function openPrimary(sessions: PageSessionFactory): Promise<PageSession> {
  try {
    return await sessions.open();
  } catch (err) {
    throw new ContainerUnavailableError(`timetable page could not be opened: ${toError(err).message}`, { cause: err });
  }
}

async function readContainer(primary: PageSession, layout: GridLayout): Promise<GridContainer> {
  try {
    return makeGridContainer(await primary.getContainerDimensions(), layout);
  } catch (err) {
    if (isScrapeError(err)) throw err;
    throw new ContainerUnavailableError(`grid container could not be read: ${toError(err).message}`, { cause: err });
  }
}

export async function runScrape(sessions: PageSessionFactory, opts: ScrapeOptions): Promise<ScrapeReport> {
  if (!Number.isInteger(opts.weekCount) || opts.weekCount <= 0) {
    throw new InvalidWeekCountError(opts.weekCount);
  }

  const startedAt = Date.now();

  const primary = await openPrimary(sessions);

  try {
    const container = await readContainer(primary, opts.layout);
    const ctx: WeekContext = { container, anchor: weekAnchor(opts.now, opts.layout) };
    const targets = buildWeekTargets(opts.now, opts.weekCount);

    logInfo(
      `scraping ${targets.length} week(s) from week ${targets[0].isoWeek} ` +
        `(grid ${container.widthPx}x${container.heightPx}px, ${container.layout.dayCount} days)`,
    );

    // Only the current week runs on the primary page; every other week pages forward
    // on a session of its own.
    const scrapeTarget = async (week: WeekTarget): Promise<WeekOutcome> => {
      const scope = weekScope(week.isoWeek);
      let session: PageSession;
      try {
        session = week.isCurrentWeek ? primary : await sessions.open();
      } catch (err) {
        logWarn(`could not open a page session: ${describeError(err)}`, scope);
        return { ok: false, week, error: toError(err) };
      }

      try {
        return await withTimeout(scrapeWeek(session, ctx, week), opts.weekTimeoutMs, week);
      } catch (err) {
        logWarn(`week failed: ${describeError(err)}`, scope);
        return { ok: false, week, error: toError(err) };
      } finally {
        if (session !== primary) await closeQuietly(session, scope);
      }
    };

    const limit = pLimit(Math.max(1, opts.concurrency));
    const outcomes = await Promise.all(targets.map((week) => limit(() => scrapeTarget(week))));

    const events = mergeOutcomes(outcomes);
    const failed = outcomes.filter((o): o is Extract<WeekOutcome, { ok: false }> => !o.ok);
    for (const o of failed) {
      logError(`dropped week ${o.week.isoWeek}: ${describeError(o.error)}`);
    }

    logInfo(
      `Done. weeks ok=${outcomes.length - failed.length}, failed=${failed.length}, ` +
        `events=${events.length}, took ${Date.now() - startedAt} ms`,
    );

    return { events, weeks: outcomes };
  } finally {
    await closeQuietly(primary, 'main');
  }
}

export function defaultNow(timezone?: string): DateTime {
  return timezone ? DateTime.now().setZone(timezone) : DateTime.now();
}
