import { describe, expect, it } from 'vitest';

import {
  buildDonationReport,
  loadDonationDatasets,
  type DonationDatasets,
} from '@/modules/donations/index.js';

import { makeDonationConfig } from '../../fixtures/builders.js';
import { makeFakeDonationSource } from '../../fixtures/fakes.js';

const config = makeDonationConfig();

const facilityRows = [
  { hospital: 'H1', date: '2024-01-01', daily: '10', blood_a: '4', blood_o: '6' },
  { hospital: 'H2', date: '2024-01-01', daily: '5', blood_a: '1', blood_o: '4' },
  { hospital: 'H1', date: '2024-01-02', daily: '8', blood_a: '3', blood_o: '5' },
  { hospital: 'H3', date: '2023-12-31', daily: '2', blood_a: '2', blood_o: '0' },
];

const regionRows = [
  { state: 'Malaysia', date: '2024-01-01', daily: '15', blood_a: '5', blood_o: '10' },
  { state: 'Selangor', date: '2024-01-01', daily: '14', blood_a: '5', blood_o: '9' },
  { state: 'Selangor', date: '2024-01-02', daily: '8', blood_a: '3', blood_o: '5' },
  { state: 'Johor', date: '2023-12-31', daily: '2', blood_a: '2', blood_o: '' },
];

const loadDatasets = async (): Promise<DonationDatasets> => {
  const source = makeFakeDonationSource({ facility: facilityRows, region: regionRows });
  const result = await loadDonationDatasets({ source, config });
  return result._unsafeUnwrap();
};

describe('loadDonationDatasets', () => {
  it('normalizes both datasets and drops the nationwide row from the region one', async () => {
    const datasets = await loadDatasets();

    expect(datasets.facility.records).toHaveLength(4);
    expect(datasets.region.records).toHaveLength(3);
    expect(datasets.region.droppedAggregateRows).toBe(1);
    expect(datasets.region.missingValues['blood_o']).toBe(1);
  });

  it('propagates a source error', async () => {
    const source = makeFakeDonationSource({
      facility: facilityRows,
      region: { type: 'NotFound', message: 'The region dataset was not found at /data/state.csv' },
    });

    const result = await loadDonationDatasets({ source, config });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'NotFound',
      message: 'The region dataset was not found at /data/state.csv',
    });
  });

  it('fails when a dataset lacks a configured column', async () => {
    const source = makeFakeDonationSource({
      facility: [{ hospital: 'H1', date: '2024-01-01', daily: '1', blood_a: '1' }],
      region: regionRows,
    });

    const result = await loadDonationDatasets({ source, config });

    expect(result._unsafeUnwrapErr().type).toBe('MissingColumns');
  });
});

describe('buildDonationReport', () => {
  it('reconciles the daily totals', async () => {
    const report = buildDonationReport(await loadDatasets(), config)._unsafeUnwrap();

    expect(report.reconciliation.rows).toEqual([
      { date: '2023-12-31', facilityTotal: 2, regionTotal: 2, difference: 0, matched: true },
      { date: '2024-01-01', facilityTotal: 15, regionTotal: 14, difference: 1, matched: false },
      { date: '2024-01-02', facilityTotal: 8, regionTotal: 8, difference: 0, matched: true },
    ]);
    expect(report.reconciliation.mismatchCount).toBe(1);
  });

  it('summarizes each dataset', async () => {
    const report = buildDonationReport(await loadDatasets(), config)._unsafeUnwrap();

    expect(report.facility.recordCount).toBe(4);
    expect([...report.facility.monthly.totals.entries()]).toEqual([
      ['2023-12', 2],
      ['2024-01', 23],
    ]);
    expect([...report.region.yearly.totals.entries()]).toEqual([
      ['2023', 2],
      ['2024', 22],
    ]);
    expect(report.facility.statistics.get('daily')?.mean).toBe(6.25);
    expect(report.region.statistics.get('blood_o')?.count).toBe(2);
    expect(report.facility.correlation.attributes).toEqual(['daily', 'blood_a', 'blood_o']);
  });

  it('ranks hospitals and pivots them by year', async () => {
    const report = buildDonationReport(await loadDatasets(), config, {
      topHospitals: 2,
    })._unsafeUnwrap();

    expect([...report.topHospitals.entries()]).toEqual([
      ['H1', 18],
      ['H2', 5],
    ]);
    expect([...report.yearlyByHospital.keys()]).toEqual(['H1', 'H2', 'H3']);
    expect([...(report.yearlyByHospital.get('H3') ?? new Map()).entries()]).toEqual([
      ['2023', 2],
    ]);
  });

  it('compares breakdown categories between the datasets', async () => {
    const report = buildDonationReport(await loadDatasets(), config)._unsafeUnwrap();

    expect(report.categories).toHaveLength(1);
    const [bloodType] = report.categories;
    expect(bloodType?.groupId).toBe('bloodType');
    expect([...(bloodType?.facility ?? new Map()).entries()]).toEqual([
      ['A', 10],
      ['O', 15],
    ]);
    expect([...(bloodType?.region ?? new Map()).entries()]).toEqual([
      ['A', 10],
      ['O', 14],
    ]);
  });

  it('rejects an invalid preview limit', async () => {
    const result = buildDonationReport(await loadDatasets(), config, { previewLimit: 1.5 });

    expect(result._unsafeUnwrapErr().field).toBe('previewLimit');
  });
});
