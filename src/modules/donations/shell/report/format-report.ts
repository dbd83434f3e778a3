/**
 * Plain-text rendering of a daily reconciliation for the terminal.
 */

import type { DailyReconciliation, DescriptiveStats } from '../../core/types.js';

const formatNumber = (value: number): string => {
  if (!Number.isFinite(value)) return 'n/a';
  return Number.isInteger(value) ? String(value) : value.toFixed(4);
};

const STAT_LABELS: readonly (readonly [keyof DescriptiveStats, string])[] = [
  ['count', 'count'],
  ['mean', 'mean'],
  ['std', 'std'],
  ['min', 'min'],
  ['p25', '25%'],
  ['p50', '50%'],
  ['p75', '75%'],
  ['max', 'max'],
];

export const formatStats = (stats: DescriptiveStats): string[] =>
  STAT_LABELS.map(([key, label]) => `  ${label.padEnd(6)}${formatNumber(stats[key])}`);

export const formatReconciliation = (reconciliation: DailyReconciliation): string => {
  const { rows, summary, mismatchCount, mismatchPreview } = reconciliation;
  const lines = [
    '--- Verification of daily totals (facility vs region) ---',
    `Dates compared: ${String(rows.length)}`,
    'Difference (facility - region):',
    ...formatStats(summary),
    '',
    `Number of mismatched days: ${String(mismatchCount)}`,
  ];

  if (mismatchCount === 0) {
    lines.push('All daily totals match between the facility and region files.');
    return lines.join('\n');
  }

  if (mismatchPreview.length > 0) {
    lines.push(`Sample of mismatched days (first ${String(mismatchPreview.length)}):`);
    for (const row of mismatchPreview) {
      lines.push(
        `  ${row.date}  facility=${formatNumber(row.facilityTotal)} region=${formatNumber(row.regionTotal)} difference=${formatNumber(row.difference)}`
      );
    }
  }

  return lines.join('\n');
};
