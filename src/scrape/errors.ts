/**
 * errors.ts
 *
 * Centralizes the error taxonomy
 * - fatal: the container read and invalid run input abort the whole run
 * - per week: pagination and timeouts fail one week only
 * - per cell: malformed text or geometry skips one cell only
 */

export type ScrapeErrorCode =
  | 'ContainerUnavailable'
  | 'PaginationNotFound'
  | 'MalformedEventText'
  | 'GeometryOutOfRange'
  | 'WeekTimeout'
  | 'InvalidWeekCount'
  | 'InvalidConfig'
  | 'CalendarAssembly';

export type ErrorContext = Record<string, unknown>;

export class ScrapeError extends Error {
  readonly code: ScrapeErrorCode;
  readonly context?: ErrorContext;

  constructor(code: ScrapeErrorCode, message: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super(message, options);
    this.name = `${code}Error`;
    this.code = code;
    this.context = context;
  }
}

export class ContainerUnavailableError extends ScrapeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ContainerUnavailable', message, undefined, options);
  }
}

export class PaginationNotFoundError extends ScrapeError {
  constructor(label: string) {
    super('PaginationNotFound', `no pagination control labelled ${label}`, { label });
  }
}

export class MalformedEventTextError extends ScrapeError {
  constructor(message: string, segments: string[], options?: { cause?: unknown }) {
    super('MalformedEventText', message, { segments }, options);
  }
}

export class GeometryOutOfRangeError extends ScrapeError {
  constructor(message: string, context: ErrorContext) {
    super('GeometryOutOfRange', message, context);
  }
}

export class WeekTimeoutError extends ScrapeError {
  constructor(label: string, timeoutMs: number) {
    super('WeekTimeout', `week ${label} did not finish within ${timeoutMs} ms`, { label, timeoutMs });
  }
}

export class InvalidWeekCountError extends ScrapeError {
  constructor(weekCount: number) {
    super('InvalidWeekCount', `week count must be a positive integer, got ${weekCount}`, { weekCount });
  }
}

export class InvalidConfigError extends ScrapeError {
  constructor(issues: string[]) {
    super('InvalidConfig', `Invalid configuration: ${issues.join('; ')}`, { issues });
  }
}

export class CalendarAssemblyError extends ScrapeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CalendarAssembly', message, undefined, options);
  }
}

export function isScrapeError(err: unknown): err is ScrapeError {
  return err instanceof ScrapeError;
}

// Cell-level failures are skipped by the worker; anything else fails the week.
export function isCellError(err: unknown): err is MalformedEventTextError | GeometryOutOfRangeError {
  return err instanceof MalformedEventTextError || err instanceof GeometryOutOfRangeError;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// Message plus context, for log lines and the NDJSON results log.
export function describeError(err: unknown): string {
  const error = toError(err);
  const head = `${error.name}: ${error.message}`;
  if (!isScrapeError(error) || !error.context) return head;

  const contextText = JSON.stringify(error.context);
  if (!contextText || contextText === '{}') return head;

  return `${head} ${contextText}`;
}
