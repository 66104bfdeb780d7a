function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function dayKey(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}

export function monthKey(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 7);
}

/**
 * ISO 8601 week: weeks start on Monday and week 1 holds the year's first Thursday.
 */
export function isoWeekKey(epochMs: number): string {
  const source = new Date(epochMs);
  const date = new Date(Date.UTC(source.getUTCFullYear(), source.getUTCMonth(), source.getUTCDate()));
  const weekday = date.getUTCDay() || 7;
  date.setUTCDate(date.getUTCDate() + 4 - weekday);

  const yearStart = Date.UTC(date.getUTCFullYear(), 0, 1);
  const week = Math.ceil(((date.getTime() - yearStart) / 86_400_000 + 1) / 7);
  return `${date.getUTCFullYear()}-W${pad(week)}`;
}
