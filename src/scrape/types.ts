/**
 * types.ts
 *
 * Shared TypeScript types used across the scraper modules.
 *
 */

import type { DateTime } from 'luxon';

export type ScrapeConfig = {
    timetableUrl: string;
    username: string;
    password: string;
    weekCount: number;
    concurrency: number;
    weekTimeoutMs: number;
    layout: GridLayout;
    timezone?: string;
    intervalHours: number;
    calendarPath: string;
    resultsPath: string;
    productId: string;
    headless: boolean;
  };

  export type Paths = {
    outDir: string;
    calendarPath: string;
    resultsPath: string;
  };

  // Layout of the rendered grid. Everything pixel-based is derived from this
  // plus the container size read from the page.
  export type GridLayout = {
    dayCount: number;
    startHour: number;
    endHour: number;
    timezoneCorrectionMinutes: number;
  };

  export type ContainerDimensions = {
    widthPx: number;
    heightPx: number;
  };

  export type GridContainer = ContainerDimensions & {
    layout: GridLayout;
  };

  export type RawCell = {
    readonly xPx: number;
    readonly yPx: number;
    readonly blockHeightPx: number;
    readonly textBlob: string;
  };

  export type DecodedGeometry = {
    weekdayOffset: number;
    timeOffsetMinutes: number;
    durationMinutes: number;
    start: DateTime;
  };

  export type EventRecord = {
    course: string;
    room: string;
    instructor: string;
    groups: string[];
    notes: string;
  };

  export type CalendarEvent = {
    readonly start: DateTime;
    readonly durationMinutes: number;
    readonly course: string;
    readonly room: string;
    readonly instructor: string;
    readonly groups: readonly string[];
    readonly notes: string;
  };

  export type WeekTarget = {
    isoWeek: number;
    weekYear: number;
    weekDelta: number;
    isCurrentWeek: boolean;
    label: string;
  };

  export type CellFailure = {
    index: number;
    error: Error;
  };

  export type WeekOutcome =
    | { ok: true; week: WeekTarget; events: CalendarEvent[]; skipped: CellFailure[] }
    | { ok: false; week: WeekTarget; error: Error };

  export type ScrapeReport = {
    events: CalendarEvent[];
    weeks: WeekOutcome[];
  };

  // Page capability the core needs. The Playwright implementation lives in page.ts;
  // tests use an in-process fake.
  export type PageAccessor = {
    getContainerDimensions(): Promise<ContainerDimensions>;
    activateWeek(label: string): Promise<void>;
    listEventCells(): Promise<RawCell[]>;
  };

  export type PageSession = PageAccessor & {
    close(): Promise<void>;
  };

  export type PageSessionFactory = {
    open(): Promise<PageSession>;
  };
