import { err, ok, type Result } from 'neverthrow';

import { byEntity, byMonth, byYear, categorySum, dailyTotal, groupSum, topN } from './group-sum.js';
import { createValidationError } from '../errors.js';

import type { ValidationError } from '../../../../common/types/errors.js';
import type { BreakdownGroup, DonationRecord, OrderedTotals } from '../types.js';

export interface GetGroupTotalsInput {
  /** 'entity', 'year', 'month' or the id of a breakdown group */
  dimension: string;
  limit?: number | undefined;
}

/**
 * Resolves a named dimension to its grouping.
 *
 * Entities rank by total (descending); years and months follow the time axis;
 * breakdown groups are keyed by category label.
 */
export const getGroupTotals = (
  records: readonly DonationRecord[],
  breakdownGroups: readonly BreakdownGroup[],
  input: GetGroupTotalsInput
): Result<OrderedTotals, ValidationError> => {
  let totals: OrderedTotals;

  switch (input.dimension) {
    case 'entity':
      totals = groupSum(records, byEntity, dailyTotal, 'by_value_desc');
      break;
    case 'year':
      totals = groupSum(records, byYear, dailyTotal, 'by_key_asc');
      break;
    case 'month':
      totals = groupSum(records, byMonth, dailyTotal, 'by_key_asc');
      break;
    default: {
      const group = breakdownGroups.find((candidate) => candidate.id === input.dimension);
      if (group === undefined) {
        const known = ['entity', 'year', 'month', ...breakdownGroups.map((g) => g.id)];
        return err(
          createValidationError(
            `Unknown dimension '${input.dimension}', expected one of: ${known.join(', ')}`,
            'dimension',
            input.dimension
          )
        );
      }
      totals = categorySum(records, group, 'by_key_asc');
    }
  }

  return ok(input.limit === undefined ? totals : topN(totals, input.limit));
};
