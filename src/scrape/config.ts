/**
 * config.ts
 * Config for scraping, read from the environment (.env is loaded by main.ts)
 */

import path from 'node:path';
import { IANAZone } from 'luxon';
import { z } from 'zod';
import { InvalidConfigError } from './errors';
import type { Paths, ScrapeConfig } from './types';

const EnvSchema = z
  .object({
    TIMETABLE_URL: z.string().url(),
    TIMETABLE_USERNAME: z.string().min(1),
    TIMETABLE_PASSWORD: z.string().min(1),
    WEEKS_TO_SCRAPE: z.coerce.number().int().positive().default(5),
    SCRAPE_CONCURRENCY: z.coerce.number().int().positive().default(3),
    WEEK_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
    // 6 and 7 both show up in the wild; 7 matches the grid as currently rendered
    GRID_DAY_COUNT: z.coerce.number().int().min(1).max(7).default(7),
    GRID_START_HOUR: z.coerce.number().int().min(0).max(23).default(7),
    GRID_END_HOUR: z.coerce.number().int().min(1).max(24).default(21),
    TZ_CORRECTION_MINUTES: z.coerce.number().int().default(60),
    TIMEZONE: z
      .string()
      .refine((zone) => IANAZone.isValidZone(zone), { message: 'not a valid IANA time zone' })
      .optional(),
    SCRAPE_INTERVAL_HOURS: z.coerce.number().positive().default(6),
    CALENDAR_PATH: z.string().min(1).default('out/timetable.ics'),
    RESULTS_PATH: z.string().min(1).default('out/weeks.ndjson'),
    CALENDAR_PRODUCT_ID: z.string().min(1).default('timetable-grid-scraper'),
    HEADLESS: z.enum(['true', 'false']).default('true'),
  })
  .refine((env) => env.GRID_END_HOUR > env.GRID_START_HOUR, {
    message: 'must be later than GRID_START_HOUR',
    path: ['GRID_END_HOUR'],
  });

// Empty variables count as unset so defaults apply.
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== '') out[k] = v;
  }
  return out;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): ScrapeConfig {
  const parsed = EnvSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    throw new InvalidConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const e = parsed.data;
  return {
    timetableUrl: e.TIMETABLE_URL,
    username: e.TIMETABLE_USERNAME,
    password: e.TIMETABLE_PASSWORD,
    weekCount: e.WEEKS_TO_SCRAPE,
    concurrency: e.SCRAPE_CONCURRENCY,
    weekTimeoutMs: e.WEEK_TIMEOUT_MS,
    layout: {
      dayCount: e.GRID_DAY_COUNT,
      startHour: e.GRID_START_HOUR,
      endHour: e.GRID_END_HOUR,
      timezoneCorrectionMinutes: e.TZ_CORRECTION_MINUTES,
    },
    timezone: e.TIMEZONE,
    intervalHours: e.SCRAPE_INTERVAL_HOURS,
    calendarPath: e.CALENDAR_PATH,
    resultsPath: e.RESULTS_PATH,
    productId: e.CALENDAR_PRODUCT_ID,
    headless: e.HEADLESS === 'true',
  };
}

// Computes abs paths derived from config
export function getPaths(cfg: ScrapeConfig, cwd: string = process.cwd()): Paths {
  const calendarPath = path.resolve(cwd, cfg.calendarPath);
  const resultsPath = path.resolve(cwd, cfg.resultsPath);
  const outDir = path.dirname(calendarPath);
  return { outDir, calendarPath, resultsPath };
}
