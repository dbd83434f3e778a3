/**
 * Maps core results to JSON-safe DTOs: ordered maps become entry lists and
 * NaN becomes null.
 */

import type {
  CorrelationMatrixDTO,
  DatasetSummaryDTO,
  DescriptiveStatsDTO,
  ReconciliationDTO,
  ReportDTO,
  TotalEntry,
} from './schemas.js';
import type {
  CorrelationMatrix,
  DailyReconciliation,
  DatasetSummary,
  DescriptiveStats,
  DonationReport,
  OrderedTotals,
} from '../../core/types.js';

export const finiteOrNull = (value: number): number | null =>
  Number.isFinite(value) ? value : null;

export const toTotalEntries = (totals: OrderedTotals): TotalEntry[] =>
  [...totals.entries()].map(([key, total]) => ({ key, total }));

export const toStatsDTO = (stats: DescriptiveStats): DescriptiveStatsDTO => ({
  count: stats.count,
  mean: finiteOrNull(stats.mean),
  std: finiteOrNull(stats.std),
  min: finiteOrNull(stats.min),
  p25: finiteOrNull(stats.p25),
  p50: finiteOrNull(stats.p50),
  p75: finiteOrNull(stats.p75),
  max: finiteOrNull(stats.max),
});

export const toReconciliationDTO = (reconciliation: DailyReconciliation): ReconciliationDTO => ({
  dateCount: reconciliation.rows.length,
  mismatchCount: reconciliation.mismatchCount,
  summary: toStatsDTO(reconciliation.summary),
  mismatchPreview: reconciliation.mismatchPreview,
  rows: reconciliation.rows,
});

export const toCorrelationDTO = (matrix: CorrelationMatrix): CorrelationMatrixDTO => ({
  attributes: matrix.attributes,
  values: matrix.values.map((row) => row.map(finiteOrNull)),
});

const toDatasetSummaryDTO = (summary: DatasetSummary): DatasetSummaryDTO => ({
  recordCount: summary.recordCount,
  droppedAggregateRows: summary.droppedAggregateRows,
  missingValues: { ...summary.missingValues },
  statistics: [...summary.statistics.entries()].map(([attribute, stats]) => ({
    attribute,
    stats: toStatsDTO(stats),
  })),
  daily: toTotalEntries(summary.daily.totals),
  monthly: toTotalEntries(summary.monthly.totals),
  yearly: toTotalEntries(summary.yearly.totals),
  correlation: toCorrelationDTO(summary.correlation),
});

export const toReportDTO = (report: DonationReport): ReportDTO => ({
  reconciliation: toReconciliationDTO(report.reconciliation),
  facility: toDatasetSummaryDTO(report.facility),
  region: toDatasetSummaryDTO(report.region),
  topHospitals: toTotalEntries(report.topHospitals),
  yearlyByHospital: [...report.yearlyByHospital.entries()].map(([hospital, years]) => ({
    hospital,
    years: toTotalEntries(years),
  })),
  categories: report.categories.map((category) => ({
    groupId: category.groupId,
    label: category.label,
    facility: toTotalEntries(category.facility),
    region: toTotalEntries(category.region),
  })),
});
