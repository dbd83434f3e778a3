import { Decimal } from 'decimal.js';

import type {
  DescriptiveStats,
  DonationRecord,
  NumericAttribute,
} from '../types.js';

const EMPTY_STATS: DescriptiveStats = {
  count: 0,
  mean: NaN,
  std: NaN,
  min: NaN,
  p25: NaN,
  p50: NaN,
  p75: NaN,
  max: NaN,
};

const sumDecimal = (values: readonly Decimal[]): Decimal =>
  values.reduce((acc, value) => acc.plus(value), new Decimal(0));

/**
 * Quantile of an ascending series, interpolating linearly between closest ranks.
 */
const quantile = (sorted: readonly number[], p: number): number => {
  const position = new Decimal(sorted.length - 1).mul(p);
  const lower = position.floor().toNumber();
  const upper = position.ceil().toNumber();
  const low = new Decimal(sorted[lower] ?? NaN);
  const high = new Decimal(sorted[upper] ?? NaN);

  return low.plus(high.minus(low).mul(position.minus(lower))).toNumber();
};

/**
 * count, mean, sample standard deviation, min, quartiles and max of a series.
 * An empty series yields NaN everywhere but `count`; a single value has NaN `std`.
 */
export const describeValues = (values: readonly number[]): DescriptiveStats => {
  const count = values.length;
  if (count === 0) return { ...EMPTY_STATS };

  const decimals = values.map((value) => new Decimal(value));
  const mean = sumDecimal(decimals).div(count);

  const std =
    count < 2
      ? NaN
      : sumDecimal(decimals.map((value) => value.minus(mean).pow(2)))
          .div(count - 1)
          .sqrt()
          .toNumber();

  const sorted = [...values].sort((a, b) => a - b);

  return {
    count,
    mean: mean.toNumber(),
    std,
    min: sorted[0] ?? NaN,
    p25: quantile(sorted, 0.25),
    p50: quantile(sorted, 0.5),
    p75: quantile(sorted, 0.75),
    max: sorted[count - 1] ?? NaN,
  };
};

/**
 * Describes every numeric attribute of a dataset, ignoring missing values.
 */
export const describeAttributes = (
  records: readonly DonationRecord[],
  attributes: readonly NumericAttribute[]
): Map<string, DescriptiveStats> =>
  new Map(
    attributes.map((attribute) => {
      const values: number[] = [];
      for (const record of records) {
        const value = attribute.select(record);
        if (value !== null) values.push(value);
      }
      return [attribute.name, describeValues(values)];
    })
  );
