const MS_PER_DAY = 1000 * 60 * 60 * 24;

// All arithmetic is done in UTC so that DST shifts never move a calendar day.
export function parseIsoDate(dateStr: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(dateStr)) return null;
  const date = new Date(`${dateStr}T00:00:00Z`);
  if (Number.isNaN(date.getTime())) return null;
  return date.toISOString().slice(0, 10) === dateStr ? date : null;
}

export function addDays(dateStr: string, days: number): string {
  const date = parseIsoDate(dateStr);
  if (!date) {
    throw new Error(`Invalid date: ${dateStr}`);
  }
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}

/** Signed whole days from `start` to `end`; NaN when either is not a date. */
export function daysBetween(start: string, end: string): number {
  const startDate = parseIsoDate(start);
  const endDate = parseIsoDate(end);
  if (!startDate || !endDate) return Number.NaN;
  return Math.round((endDate.getTime() - startDate.getTime()) / MS_PER_DAY);
}
