import type { DonationRecord, Granularity, PeriodSeries } from '../types.js';

const PERIOD_KEY_LENGTH: Record<Granularity, number> = {
  day: 10, // YYYY-MM-DD
  month: 7, // YYYY-MM
  year: 4, // YYYY
};

/**
 * Period key of an ISO date at the given granularity, or null for an invalid date.
 */
export const toPeriodKey = (date: string | null, granularity: Granularity): string | null =>
  date === null ? null : date.slice(0, PERIOD_KEY_LENGTH[granularity]);

export const compareKeys = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Sums `dailyTotal` per period, ascending by period.
 * Records without a valid date are skipped; missing totals add nothing.
 */
export const aggregateByPeriod = (
  records: readonly DonationRecord[],
  granularity: Granularity
): PeriodSeries => {
  const sums = new Map<string, number>();

  for (const record of records) {
    const key = toPeriodKey(record.date, granularity);
    if (key === null) continue;
    sums.set(key, (sums.get(key) ?? 0) + (record.dailyTotal ?? 0));
  }

  const totals = new Map(
    [...sums.entries()].sort(([a], [b]) => compareKeys(a, b))
  );

  return { granularity, totals };
};
