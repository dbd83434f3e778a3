import { err, ok, type Result } from 'neverthrow';

import { compareKeys } from './aggregate-by-period.js';
import { describeValues } from './describe-values.js';
import { createValidationError } from '../errors.js';
import { DEFAULT_MISMATCH_PREVIEW_LIMIT } from '../types.js';

import type {
  DailyReconciliation,
  PeriodSeries,
  ReconcileOptions,
  ReconciliationRow,
} from '../types.js';
import type { ValidationError } from '../../../../common/types/errors.js';

/**
 * Aligns facility-summed and region-reported daily totals on date.
 *
 * Every date present on either side gets a row; the absent side counts as 0.
 * A date matches only when the difference is exactly zero.
 */
export const reconcileDailyTotals = (
  facilityDaily: PeriodSeries,
  regionDaily: PeriodSeries,
  options: ReconcileOptions = {}
): Result<DailyReconciliation, ValidationError> => {
  for (const [field, series] of [
    ['facilityDaily', facilityDaily],
    ['regionDaily', regionDaily],
  ] as const) {
    if (series.granularity !== 'day') {
      return err(
        createValidationError(
          `Reconciliation needs day granularity, got '${series.granularity}'`,
          field,
          series.granularity
        )
      );
    }
  }

  const previewLimit = options.previewLimit ?? DEFAULT_MISMATCH_PREVIEW_LIMIT;
  if (!Number.isInteger(previewLimit) || previewLimit < 0) {
    return err(
      createValidationError('previewLimit must be a non-negative integer', 'previewLimit', previewLimit)
    );
  }

  const dates = [...new Set([...facilityDaily.totals.keys(), ...regionDaily.totals.keys()])].sort(
    compareKeys
  );

  const rows: ReconciliationRow[] = dates.map((date) => {
    const facilityTotal = facilityDaily.totals.get(date) ?? 0;
    const regionTotal = regionDaily.totals.get(date) ?? 0;
    const difference = facilityTotal - regionTotal;
    return { date, facilityTotal, regionTotal, difference, matched: difference === 0 };
  });

  const mismatches = rows.filter((row) => !row.matched);

  return ok({
    rows,
    summary: describeValues(rows.map((row) => row.difference)),
    mismatchCount: mismatches.length,
    mismatchPreview: mismatches.slice(0, previewLimit),
  });
};
