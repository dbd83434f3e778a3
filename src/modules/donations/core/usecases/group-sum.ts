import { compareKeys, toPeriodKey } from './aggregate-by-period.js';

import type {
  BreakdownGroup,
  DonationRecord,
  GroupKey,
  OrderedTotals,
  SortOrder,
  ValueSelector,
} from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Selectors
// ─────────────────────────────────────────────────────────────────────────────

export const byEntity: GroupKey<DonationRecord> = (record) => record.entityId;
export const byDay: GroupKey<DonationRecord> = (record) => toPeriodKey(record.date, 'day');
export const byMonth: GroupKey<DonationRecord> = (record) => toPeriodKey(record.date, 'month');
export const byYear: GroupKey<DonationRecord> = (record) => toPeriodKey(record.date, 'year');

export const dailyTotal: ValueSelector<DonationRecord> = (record) => record.dailyTotal;

export const breakdownValue =
  (column: string): ValueSelector<DonationRecord> =>
  (record) =>
    record.breakdown[column] ?? null;

// ─────────────────────────────────────────────────────────────────────────────
// Aggregation
// ─────────────────────────────────────────────────────────────────────────────

const sortTotals = (sums: Map<string, number>, order: SortOrder): Map<string, number> => {
  const entries = [...sums.entries()];

  // Stable: equal totals keep first-seen order.
  if (order === 'by_value_desc') {
    entries.sort(([, a], [, b]) => b - a);
  } else {
    entries.sort(([a], [b]) => compareKeys(a, b));
  }

  return new Map(entries);
};

/**
 * Sums a value per group.
 *
 * Items whose key is null are skipped. Null values add nothing, but still
 * register their group.
 */
export const groupSum = <T>(
  items: readonly T[],
  groupKey: GroupKey<T>,
  valueSelector: ValueSelector<T>,
  order: SortOrder
): OrderedTotals => {
  const sums = new Map<string, number>();

  for (const item of items) {
    const key = groupKey(item);
    if (key === null) continue;
    sums.set(key, (sums.get(key) ?? 0) + (valueSelector(item) ?? 0));
  }

  return sortTotals(sums, order);
};

interface CategoryCell {
  label: string;
  value: number | null;
}

/**
 * Totals of every category of a breakdown group, keyed by category label.
 */
export const categorySum = (
  records: readonly DonationRecord[],
  group: BreakdownGroup,
  order: SortOrder
): OrderedTotals => {
  const cells: CategoryCell[] = [];

  for (const record of records) {
    for (const { column, label } of group.categories) {
      cells.push({ label, value: record.breakdown[column] ?? null });
    }
  }

  return groupSum(
    cells,
    (cell) => cell.label,
    (cell) => cell.value,
    order
  );
};

/**
 * Two-level grouping: one ordered set of column totals per row key.
 * Rows and columns are both ordered by key.
 */
export const pivotSum = <T>(
  items: readonly T[],
  rowKey: GroupKey<T>,
  columnKey: GroupKey<T>,
  valueSelector: ValueSelector<T>
): Map<string, OrderedTotals> => {
  const buckets = new Map<string, T[]>();

  for (const item of items) {
    const key = rowKey(item);
    if (key === null) continue;
    const bucket = buckets.get(key);
    if (bucket === undefined) {
      buckets.set(key, [item]);
    } else {
      bucket.push(item);
    }
  }

  return new Map(
    [...buckets.entries()]
      .sort(([a], [b]) => compareKeys(a, b))
      .map(([key, bucket]): [string, OrderedTotals] => [
        key,
        groupSum(bucket, columnKey, valueSelector, 'by_key_asc'),
      ])
  );
};

/**
 * First `n` entries of an ordered mapping.
 */
export const topN = (totals: OrderedTotals, n: number): OrderedTotals =>
  new Map([...totals.entries()].slice(0, Math.max(0, n)));
