import { describe, expect, it } from 'vitest';

import {
  aggregateByPeriod,
  normalizeRecords,
  reconcileDailyTotals,
  type PeriodSeries,
} from '@/modules/donations/index.js';

import { makeDatasetSchema } from '../../fixtures/builders.js';

const daily = (entries: [string, number][]): PeriodSeries => ({
  granularity: 'day',
  totals: new Map(entries),
});

describe('reconcileDailyTotals', () => {
  it('flags the facility/region gap once the nationwide row is dropped', () => {
    const schema = makeDatasetSchema({ breakdownColumns: [] });
    const facility = normalizeRecords(
      [
        { hospital: 'H1', date: '2023-01-01', daily: '10' },
        { hospital: 'H2', date: '2023-01-01', daily: '5' },
      ],
      schema,
      { isRegionDataset: false }
    )._unsafeUnwrap();
    const region = normalizeRecords(
      [
        { hospital: 'RegionA', date: '2023-01-01', daily: '14' },
        { hospital: 'Malaysia', date: '2023-01-01', daily: '14' },
      ],
      schema,
      { isRegionDataset: true, nationwideEntity: 'Malaysia' }
    )._unsafeUnwrap();

    const result = reconcileDailyTotals(
      aggregateByPeriod(facility.records, 'day'),
      aggregateByPeriod(region.records, 'day')
    )._unsafeUnwrap();

    expect(result.rows).toEqual([
      {
        date: '2023-01-01',
        facilityTotal: 15,
        regionTotal: 14,
        difference: 1,
        matched: false,
      },
    ]);
    expect(result.mismatchCount).toBe(1);
  });

  it('finds no mismatch when both sides are identical', () => {
    const series = daily([
      ['2024-01-01', 3],
      ['2024-01-02', 8],
      ['2024-01-03', 0],
    ]);

    const result = reconcileDailyTotals(series, series)._unsafeUnwrap();

    expect(result.mismatchCount).toBe(0);
    expect(result.mismatchPreview).toEqual([]);
    expect(result.rows.map((row) => row.difference)).toEqual([0, 0, 0]);
    expect(result.summary).toEqual({
      count: 3,
      mean: 0,
      std: 0,
      min: 0,
      p25: 0,
      p50: 0,
      p75: 0,
      max: 0,
    });
  });

  it('is antisymmetric', () => {
    const facility = daily([
      ['2024-01-01', 10],
      ['2024-01-02', 7],
    ]);
    const region = daily([
      ['2024-01-01', 8],
      ['2024-01-03', 4],
    ]);

    const forward = reconcileDailyTotals(facility, region)._unsafeUnwrap();
    const backward = reconcileDailyTotals(region, facility)._unsafeUnwrap();

    expect(forward.rows.map((row) => row.date)).toEqual(['2024-01-01', '2024-01-02', '2024-01-03']);
    expect(backward.rows.map((row) => row.difference)).toEqual(
      forward.rows.map((row) => -row.difference)
    );
    expect(backward.rows.map((row) => row.matched)).toEqual(forward.rows.map((row) => row.matched));
  });

  it('counts a date missing on one side as zero there', () => {
    const result = reconcileDailyTotals(
      daily([['2024-05-01', 50]]),
      daily([])
    )._unsafeUnwrap();

    expect(result.rows).toEqual([
      { date: '2024-05-01', facilityTotal: 50, regionTotal: 0, difference: 50, matched: false },
    ]);
  });

  it('limits the mismatch preview', () => {
    const facility = daily([
      ['2024-01-01', 1],
      ['2024-01-02', 2],
      ['2024-01-03', 3],
      ['2024-01-04', 4],
    ]);
    const region = daily([
      ['2024-01-01', 0],
      ['2024-01-02', 2],
      ['2024-01-03', 0],
      ['2024-01-04', 0],
    ]);

    const result = reconcileDailyTotals(facility, region, { previewLimit: 2 })._unsafeUnwrap();

    expect(result.mismatchCount).toBe(3);
    expect(result.mismatchPreview.map((row) => row.date)).toEqual(['2024-01-01', '2024-01-03']);
    expect(result.summary.count).toBe(4);
    expect(result.summary.mean).toBe(2);
    expect(result.summary.p50).toBe(2);
    expect(result.summary.max).toBe(4);
  });

  it('rejects series that are not daily', () => {
    const monthly: PeriodSeries = { granularity: 'month', totals: new Map([['2024-01', 5]]) };

    expect(reconcileDailyTotals(monthly, daily([]))._unsafeUnwrapErr()).toEqual({
      type: 'ValidationError',
      message: "Reconciliation needs day granularity, got 'month'",
      field: 'facilityDaily',
      value: 'month',
    });
    expect(reconcileDailyTotals(daily([]), monthly)._unsafeUnwrapErr().field).toBe('regionDaily');
  });

  it('rejects a negative preview limit', () => {
    const result = reconcileDailyTotals(daily([]), daily([]), { previewLimit: -1 });

    expect(result._unsafeUnwrapErr().field).toBe('previewLimit');
  });

  it('returns an empty reconciliation for empty inputs', () => {
    const result = reconcileDailyTotals(daily([]), daily([]))._unsafeUnwrap();

    expect(result.rows).toEqual([]);
    expect(result.mismatchCount).toBe(0);
    expect(result.summary.count).toBe(0);
    expect(result.summary.mean).toBeNaN();
  });
});
