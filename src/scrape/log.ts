/**
 * log.ts
 *
 * Console logging with a scope and level prefix, e.g. `[week 43] [WARN] ...`.
 * Debug lines only print when DEBUG=true.
 */

type Level = 'INFO' | 'DEBUG' | 'WARN' | 'ERROR';

export function isDebugEnabled(): boolean {
  return /^true$/i.test(process.env.DEBUG ?? '');
}

function prefix(level: Level, scope?: string): string {
  const label = scope && scope.trim().length ? scope.trim() : 'main';
  return `[${label}] [${level}]`;
}

export function logInfo(message: string, scope?: string): void {
  console.log(`${prefix('INFO', scope)} ${message}`);
}

export function logDebug(message: string, scope?: string): void {
  if (!isDebugEnabled()) return;
  console.log(`${prefix('DEBUG', scope)} ${message}`);
}

export function logWarn(message: string, scope?: string): void {
  console.warn(`${prefix('WARN', scope)} ${message}`);
}

export function logError(message: string, scope?: string): void {
  console.error(`${prefix('ERROR', scope)} ${message}`);
}

export function weekScope(isoWeek: number): string {
  return `week ${isoWeek}`;
}
