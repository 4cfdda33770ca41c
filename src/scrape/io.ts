/**
 * io.ts
 *
 * Contains all filesystem I/O for the scraper
 * - create output directories
 * - write the calendar file
 * - append one NDJSON record per scraped week
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { describeError } from './errors';
import type { Paths, WeekOutcome } from './types';

export type WeekRecord = {
  runAt: string;
  isoWeek: number;
  weekYear: number;
  ok: boolean;
  events: number;
  skippedCells: number;
  error?: string;
};

// ensure output directories exist
export async function ensureDirs(paths: Paths) {
  await fs.mkdir(paths.outDir, { recursive: true });
  await fs.mkdir(path.dirname(paths.calendarPath), { recursive: true });
  await fs.mkdir(path.dirname(paths.resultsPath), { recursive: true });
}

export function toWeekRecord(outcome: WeekOutcome, runAt: string): WeekRecord {
  const { week } = outcome;
  if (!outcome.ok) {
    return {
      runAt,
      isoWeek: week.isoWeek,
      weekYear: week.weekYear,
      ok: false,
      events: 0,
      skippedCells: 0,
      error: describeError(outcome.error),
    };
  }
  return {
    runAt,
    isoWeek: week.isoWeek,
    weekYear: week.weekYear,
    ok: true,
    events: outcome.events.length,
    skippedCells: outcome.skipped.length,
  };
}

// Append one record as a single NDJSON line.
export async function appendResult(resultsPath: string, record: WeekRecord) {
  await fs.appendFile(resultsPath, JSON.stringify(record) + '\n', 'utf8');
}

// Written to a temp file, then renamed over the previous calendar.
export async function writeCalendarFile(calendarPath: string, ics: string) {
  const tmp = `${calendarPath}.tmp`;
  await fs.writeFile(tmp, ics, 'utf8');
  await fs.rename(tmp, calendarPath);
}
