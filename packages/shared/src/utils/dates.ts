/**
 * Calendar-day helpers. Days are plain `YYYY-MM-DD` strings in UTC.
 */

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isIsoDay(value: string): boolean {
  const match = DAY_PATTERN.exec(value);
  if (!match) return false;
  const d = new Date(value + 'T00:00:00Z');
  return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === value;
}

export function addDays(dateStr: string, days: number): string {
  const d = new Date(dateStr + 'T00:00:00Z');
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

export function daysBetween(startStr: string, endStr: string): number {
  const start = new Date(startStr + 'T00:00:00Z');
  const end = new Date(endStr + 'T00:00:00Z');
  return Math.round((end.getTime() - start.getTime()) / (1000 * 60 * 60 * 24));
}

export function todayIso(): string {
  return new Date().toISOString().slice(0, 10);
}

/** '2024-01-05' -> '20240105' */
export function formatCompact(dateStr: string): string {
  return dateStr.replace(/-/g, '');
}

/** '2024-01-05' -> '05/01/24' */
export function formatDdMmYy(dateStr: string): string {
  const [year, month, day] = dateStr.split('-');
  return `${day}/${month}/${year.slice(2)}`;
}

export function splitDay(dateStr: string): { year: string; month: string; day: string } {
  const [year, month, day] = dateStr.split('-');
  return { year, month, day };
}
