/**
 * main.ts
 *
 * Periodic runner: scrape the configured weeks, write the calendar file,
 * append per-week records, sleep, repeat. `--once` runs a single scrape.
 */

import 'dotenv/config';
import { buildCalendar } from './scrape/calendar';
import { getConfig, getPaths } from './scrape/config';
import { describeError } from './scrape/errors';
import { appendResult, ensureDirs, toWeekRecord, writeCalendarFile } from './scrape/io';
import { logError, logInfo, logWarn } from './scrape/log';
import { launchBrowserSessions } from './scrape/page';
import { defaultNow, runScrape } from './scrape/run';
import type { ScrapeConfig } from './scrape/types';

const HOUR_MS = 60 * 60 * 1000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function scrapeOnce(cfg: ScrapeConfig) {
  const paths = getPaths(cfg);
  await ensureDirs(paths);

  const sessions = await launchBrowserSessions(cfg);
  const report = await (async () => {
    try {
      return await runScrape(sessions, {
        weekCount: cfg.weekCount,
        concurrency: cfg.concurrency,
        weekTimeoutMs: cfg.weekTimeoutMs,
        layout: cfg.layout,
        now: defaultNow(cfg.timezone),
      });
    } finally {
      await sessions.close();
    }
  })();

  const runAt = new Date().toISOString();
  for (const outcome of report.weeks) {
    await appendResult(paths.resultsPath, toWeekRecord(outcome, runAt));
  }

  if (report.events.length === 0) {
    logWarn('No events scraped; keeping the previous calendar file');
    return;
  }

  logInfo(`Creating calendar from ${report.events.length} merged event(s)`);
  await writeCalendarFile(paths.calendarPath, buildCalendar(report.events, { productId: cfg.productId }));
  logInfo(`Calendar written to ${paths.calendarPath}`);
}

async function main() {
  const cfg = getConfig();
  const once = process.argv.includes('--once');

  for (;;) {
    const startedAt = Date.now();
    try {
      await scrapeOnce(cfg);
      logInfo(`Scraping took ${Date.now() - startedAt} ms`);
    } catch (err) {
      if (once) throw err;
      logError(`Run failed: ${describeError(err)}`);
    }

    if (once) return;

    const next = new Date(Date.now() + cfg.intervalHours * HOUR_MS);
    logInfo(`Done. Next run at: ${next.toISOString()}`);
    await sleep(cfg.intervalHours * HOUR_MS);
  }
}

if (require.main === module) {
  main().catch((err) => {
    logError(describeError(err));
    process.exitCode = 1;
  });
}
