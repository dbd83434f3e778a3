// Source and config
export { createCsvDonationSource, parseCsvRows, type CsvDonationSourceOptions } from './shell/repo/csv-source.js';
export { loadDonationConfig, type LoadDonationConfigOptions } from './shell/repo/config-loader.js';
export type { DonationSource } from './core/ports.js';

// Use cases
export { normalizeRecords, parseCalendarDate, parseCount } from './core/usecases/normalize-records.js';
export { aggregateByPeriod, compareKeys, toPeriodKey } from './core/usecases/aggregate-by-period.js';
export { describeValues, describeAttributes } from './core/usecases/describe-values.js';
export { reconcileDailyTotals } from './core/usecases/reconcile-daily-totals.js';
export {
  groupSum,
  categorySum,
  pivotSum,
  topN,
  byEntity,
  byDay,
  byMonth,
  byYear,
  dailyTotal,
  breakdownValue,
} from './core/usecases/group-sum.js';
export { correlationMatrix, numericAttributes, pearson } from './core/usecases/correlation-matrix.js';
export { getGroupTotals, type GetGroupTotalsInput } from './core/usecases/get-group-totals.js';
export {
  loadDonationDatasets,
  type LoadDonationDatasetsDeps,
} from './core/usecases/load-donation-datasets.js';
export { buildDonationReport } from './core/usecases/build-donation-report.js';

// REST
export { makeDonationRoutes, type MakeDonationRoutesDeps } from './shell/rest/routes.js';
export { toReportDTO } from './shell/rest/serialize.js';

// Terminal output
export { formatReconciliation, formatStats } from './shell/report/format-report.js';

// Types
export {
  DEFAULT_MISMATCH_PREVIEW_LIMIT,
  DEFAULT_NATIONWIDE_ENTITY,
  DEFAULT_TOP_HOSPITALS,
  UNKNOWN_ENTITY,
  DATASET_KINDS,
} from './core/types.js';
export type {
  BreakdownCategory,
  BreakdownGroup,
  BuildDonationReportInput,
  CategoryComparison,
  CorrelationMatrix,
  DailyReconciliation,
  DatasetKind,
  DatasetSchema,
  DatasetSummary,
  DescriptiveStats,
  DonationConfig,
  DonationDatasets,
  DonationRecord,
  DonationReport,
  Granularity,
  NormalizedDataset,
  NormalizeOptions,
  NumericAttribute,
  OrderedTotals,
  PeriodSeries,
  RawRow,
  ReconcileOptions,
  ReconciliationRow,
  SortOrder,
} from './core/types.js';

// Errors
export {
  getHttpStatusForError,
  type DonationError,
  type DonationInputError,
  type DonationSourceError,
} from './core/errors.js';
