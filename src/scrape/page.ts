/**
 * page.ts
 *
 * Playwright-backed page sessions for the scraper.
 *
 * - launches one Chromium browser with a single shared context (cookies are shared)
 * - signs in on the primary page, reloading once if the grid does not show up
 * - opens every other session as a new page on the same context
 * - reads the grid container, pagination buttons and event blocks from the DOM
 */

import { chromium } from '@playwright/test';
import type { Browser, BrowserContext, Locator, Page, Response } from '@playwright/test';
import { PaginationNotFoundError } from './errors';
import { logInfo } from './log';
import { installAssetBlocking } from './safety';
import { readStylePx, readStylePxOrNaN } from './style';
import type { ContainerDimensions, PageSession, PageSessionFactory, RawCell, ScrapeConfig } from './types';

export const SELECTORS = {
  username: 'input#username',
  password: 'input#password',
  grid: 'div.grilleData',
  cells: 'div.grilleData > div',
  eventTable: 'table.event',
  eventText: 'div.eventText',
  weekButton: 'button.x-btn-text',
} as const;

const GRID_TIMEOUT_MS = 30_000;
const PAGINATION_TIMEOUT_MS = 15_000;
const STALE_ATTR = 'data-stale-week';

async function waitForGrid(page: Page) {
  await page.locator(SELECTORS.grid).first().waitFor({ state: 'attached', timeout: GRID_TIMEOUT_MS });
}

// Fill the login form, then wait for the timetable grid. One reload if it does not appear.
export async function signIn(page: Page, cfg: ScrapeConfig) {
  logInfo(`Navigating to ${new URL(cfg.timetableUrl).host}`);
  await page.goto(cfg.timetableUrl);

  await page.locator(SELECTORS.username).fill(cfg.username);
  await page.locator(SELECTORS.password).fill(cfg.password);
  await page.locator(SELECTORS.password).press('Enter');

  try {
    await waitForGrid(page);
  } catch {
    logInfo('Timetable grid did not load. Reloading to retry.');
    await page.reload();
    await waitForGrid(page);
  }
}

export type WeekSwitchSteps = {
  // tags the cells currently in the grid and returns how many there were
  markCells(): Promise<number>;
  clickAndAwaitReload(): Promise<void>;
  waitForMarkedCellsGone(): Promise<void>;
  waitForGrid(): Promise<void>;
};

// A week button re-renders the grid in place without navigating, so the previous
// week's cells stay attached until the reload lands.
export async function switchWeek(steps: WeekSwitchSteps): Promise<void> {
  const stale = await steps.markCells();
  await steps.clickAndAwaitReload();
  if (stale > 0) await steps.waitForMarkedCellsGone();
  await steps.waitForGrid();
}

function isGridReload(response: Response): boolean {
  const type = response.request().resourceType();
  return type === 'xhr' || type === 'fetch';
}

async function readCell(block: Locator): Promise<RawCell> {
  const position = await block.getAttribute('style');
  const height = await block.locator(SELECTORS.eventTable).first().getAttribute('style');
  const textBlob = await block.locator(SELECTORS.eventText).first().innerHTML();

  return {
    xPx: readStylePxOrNaN(position, 'left'),
    yPx: readStylePxOrNaN(position, 'top'),
    blockHeightPx: readStylePxOrNaN(height, 'height'),
    textBlob,
  };
}

export function createPlaywrightSession(page: Page): PageSession {
  return {
    async getContainerDimensions(): Promise<ContainerDimensions> {
      await waitForGrid(page);
      const style = await page.locator(SELECTORS.grid).first().getAttribute('style');
      const widthPx = readStylePx(style, 'width');
      const heightPx = readStylePx(style, 'height');
      if (widthPx === null || heightPx === null) {
        throw new Error(`grid container style has no width/height: ${style ?? '(none)'}`);
      }
      return { widthPx, heightPx };
    },

    async activateWeek(label: string) {
      const buttons = page.locator(SELECTORS.weekButton);
      try {
        await buttons.first().waitFor({ timeout: PAGINATION_TIMEOUT_MS });
      } catch {
        throw new PaginationNotFoundError(label);
      }

      const target = buttons.filter({ hasText: label });
      if ((await target.count()) === 0) {
        throw new PaginationNotFoundError(label);
      }

      await switchWeek({
        markCells: () =>
          page.locator(SELECTORS.cells).evaluateAll((els, attr) => {
            for (const el of els) el.setAttribute(attr, '');
            return els.length;
          }, STALE_ATTR),
        clickAndAwaitReload: async () => {
          await Promise.all([
            page.waitForResponse(isGridReload, { timeout: GRID_TIMEOUT_MS }),
            target.first().click(),
          ]);
          await page.waitForLoadState('networkidle');
        },
        waitForMarkedCellsGone: () =>
          page
            .locator(`${SELECTORS.cells}[${STALE_ATTR}]`)
            .first()
            .waitFor({ state: 'detached', timeout: GRID_TIMEOUT_MS }),
        waitForGrid: () => waitForGrid(page),
      });
    },

    async listEventCells(): Promise<RawCell[]> {
      await waitForGrid(page);
      const blocks = await page.locator(SELECTORS.cells).all();
      const cells: RawCell[] = [];
      for (const block of blocks) {
        cells.push(await readCell(block));
      }
      return cells;
    },

    async close() {
      await page.close();
    },
  };
}

export type BrowserSessions = PageSessionFactory & {
  close(): Promise<void>;
};

// The first open() returns the signed-in page; later ones open the timetable on new pages.
export async function launchBrowserSessions(cfg: ScrapeConfig): Promise<BrowserSessions> {
  const browser: Browser = await chromium.launch({ headless: cfg.headless });
  let context: BrowserContext | undefined;
  let signedIn = false;

  const newPage = async (): Promise<Page> => {
    context ??= await browser.newContext();
    const page = await context.newPage();
    await installAssetBlocking(page);
    return page;
  };

  return {
    async open() {
      const page = await newPage();
      if (!signedIn) {
        await signIn(page, cfg);
        signedIn = true;
      } else {
        await page.goto(cfg.timetableUrl);
        await waitForGrid(page);
      }
      return createPlaywrightSession(page);
    },

    async close() {
      await browser.close();
    },
  };
}
