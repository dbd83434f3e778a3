import { Decimal } from 'decimal.js';

import { breakdownValue, dailyTotal } from './group-sum.js';

import type {
  CorrelationMatrix,
  DatasetSchema,
  DonationRecord,
  NumericAttribute,
} from '../types.js';

/**
 * The daily total followed by every breakdown column, named by source column.
 */
export const numericAttributes = (schema: DatasetSchema): NumericAttribute[] => [
  { name: schema.totalColumn, select: dailyTotal },
  ...schema.breakdownColumns.map((column) => ({ name: column, select: breakdownValue(column) })),
];

const hasVariance = (values: readonly (number | null)[]): boolean => {
  let first: number | null = null;
  for (const value of values) {
    if (value === null) continue;
    if (first === null) first = value;
    else if (value !== first) return true;
  }
  return false;
};

/**
 * Pearson coefficient over the observations where both series have a value.
 * NaN when fewer than two pairs remain or either side is constant.
 */
export const pearson = (xs: readonly (number | null)[], ys: readonly (number | null)[]): number => {
  const pairs: [Decimal, Decimal][] = [];
  for (let i = 0; i < Math.min(xs.length, ys.length); i++) {
    const x = xs[i];
    const y = ys[i];
    if (x === null || x === undefined || y === null || y === undefined) continue;
    pairs.push([new Decimal(x), new Decimal(y)]);
  }

  if (pairs.length < 2) return NaN;

  const zero = new Decimal(0);
  const meanX = pairs.reduce((acc, [x]) => acc.plus(x), zero).div(pairs.length);
  const meanY = pairs.reduce((acc, [, y]) => acc.plus(y), zero).div(pairs.length);

  let sxy = zero;
  let sxx = zero;
  let syy = zero;
  for (const [x, y] of pairs) {
    const dx = x.minus(meanX);
    const dy = y.minus(meanY);
    sxy = sxy.plus(dx.mul(dy));
    sxx = sxx.plus(dx.pow(2));
    syy = syy.plus(dy.pow(2));
  }

  if (sxx.isZero() || syy.isZero()) return NaN;

  const r = sxy.div(sxx.mul(syy).sqrt()).toNumber();
  return Math.min(1, Math.max(-1, r));
};

/**
 * Symmetric matrix of Pearson coefficients between numeric attributes.
 *
 * The diagonal is exactly 1 for attributes that vary; every pair involving a
 * constant attribute is NaN.
 */
export const correlationMatrix = (
  records: readonly DonationRecord[],
  attributes: readonly NumericAttribute[]
): CorrelationMatrix => {
  const columns = attributes.map((attribute) => records.map(attribute.select));
  const varies = columns.map(hasVariance);
  const values = attributes.map(() => attributes.map(() => NaN));

  for (let i = 0; i < columns.length; i++) {
    const row = values[i];
    const xs = columns[i];
    if (row === undefined || xs === undefined) continue;

    row[i] = varies[i] === true ? 1 : NaN;

    for (let j = i + 1; j < columns.length; j++) {
      const ys = columns[j];
      const mirror = values[j];
      if (ys === undefined || mirror === undefined) continue;

      const r = varies[i] === true && varies[j] === true ? pearson(xs, ys) : NaN;
      row[j] = r;
      mirror[i] = r;
    }
  }

  return { attributes: attributes.map((attribute) => attribute.name), values };
};
