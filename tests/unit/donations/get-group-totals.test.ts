import { describe, expect, it } from 'vitest';

import { getGroupTotals } from '@/modules/donations/index.js';

import { BLOOD_TYPE_GROUP, makeRecord } from '../../fixtures/builders.js';

const records = [
  makeRecord({
    entityId: 'H1',
    date: '2024-01-05',
    dailyTotal: 3,
    breakdown: { blood_a: 1, blood_o: 2 },
  }),
  makeRecord({
    entityId: 'H2',
    date: '2023-12-30',
    dailyTotal: 9,
    breakdown: { blood_a: 4, blood_o: 5 },
  }),
  makeRecord({
    entityId: 'H3',
    date: '2024-01-06',
    dailyTotal: 6,
    breakdown: { blood_a: 6, blood_o: 0 },
  }),
];

const groups = [BLOOD_TYPE_GROUP];

describe('getGroupTotals', () => {
  it('ranks entities by total', () => {
    const totals = getGroupTotals(records, groups, { dimension: 'entity' })._unsafeUnwrap();

    expect([...totals.entries()]).toEqual([
      ['H2', 9],
      ['H3', 6],
      ['H1', 3],
    ]);
  });

  it('orders years and months along the time axis', () => {
    expect([
      ...getGroupTotals(records, groups, { dimension: 'year' })._unsafeUnwrap().entries(),
    ]).toEqual([
      ['2023', 9],
      ['2024', 9],
    ]);
    expect([
      ...getGroupTotals(records, groups, { dimension: 'month' })._unsafeUnwrap().keys(),
    ]).toEqual(['2023-12', '2024-01']);
  });

  it('totals a breakdown group by category label', () => {
    const totals = getGroupTotals(records, groups, { dimension: 'bloodType' })._unsafeUnwrap();

    expect([...totals.entries()]).toEqual([
      ['A', 11],
      ['O', 7],
    ]);
  });

  it('applies the limit after ordering', () => {
    const totals = getGroupTotals(records, groups, {
      dimension: 'entity',
      limit: 2,
    })._unsafeUnwrap();

    expect([...totals.keys()]).toEqual(['H2', 'H3']);
  });

  it('rejects an unknown dimension', () => {
    const error = getGroupTotals(records, groups, { dimension: 'rhesus' })._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'ValidationError',
      message: "Unknown dimension 'rhesus', expected one of: entity, year, month, bloodType",
      field: 'dimension',
      value: 'rhesus',
    });
  });
});
