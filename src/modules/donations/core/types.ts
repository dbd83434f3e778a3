import { type Static, Type } from '@sinclair/typebox';

/** Sentinel for a reporting unit with no name in the source. */
export const UNKNOWN_ENTITY = 'Unknown';

/** Region dataset row that aggregates every region. */
export const DEFAULT_NATIONWIDE_ENTITY = 'Malaysia';

export const DEFAULT_MISMATCH_PREVIEW_LIMIT = 10;

const ColumnNameSchema = Type.String({ minLength: 1 });

/**
 * Column names of one source dataset.
 */
export const DatasetColumnsSchema = Type.Object({
  entityColumn: ColumnNameSchema,
  dateColumn: ColumnNameSchema,
  totalColumn: ColumnNameSchema,
  breakdownColumns: Type.Array(ColumnNameSchema),
});

export type DatasetSchema = Static<typeof DatasetColumnsSchema>;

const BreakdownCategorySchema = Type.Object({
  column: ColumnNameSchema,
  label: Type.String({ minLength: 1 }),
});

/**
 * Named set of breakdown columns that partition the daily total
 * (blood type, donation type, donor type, social group).
 */
export const BreakdownGroupSchema = Type.Object({
  id: Type.String({ pattern: '^[A-Za-z][A-Za-z0-9]*$' }),
  label: Type.String({ minLength: 1 }),
  categories: Type.Array(BreakdownCategorySchema, { minItems: 1 }),
});

export type BreakdownCategory = Static<typeof BreakdownCategorySchema>;
export type BreakdownGroup = Static<typeof BreakdownGroupSchema>;

const DatasetSourceSchema = Type.Object({
  file: Type.String({ minLength: 1, description: 'CSV path, relative to the data directory' }),
  columns: DatasetColumnsSchema,
});

export const DonationConfigFileSchema = Type.Object({
  nationwideEntity: Type.Optional(Type.String({ minLength: 1 })),
  datasets: Type.Object({
    facility: DatasetSourceSchema,
    region: DatasetSourceSchema,
  }),
  breakdownGroups: Type.Array(BreakdownGroupSchema),
});

export type DonationConfigFileDTO = Static<typeof DonationConfigFileSchema>;

export type DatasetKind = 'facility' | 'region';

export const DATASET_KINDS: readonly DatasetKind[] = ['facility', 'region'];

/**
 * Resolved configuration used by the shell and the report builder.
 */
export interface DonationConfig {
  nationwideEntity: string;
  datasets: Record<DatasetKind, { filePath: string; schema: DatasetSchema }>;
  breakdownGroups: BreakdownGroup[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Records
// ─────────────────────────────────────────────────────────────────────────────

/** One row as handed over by a loader, before any cleaning. */
export type RawRow = Readonly<Record<string, unknown>>;

export interface DonationRecord {
  readonly entityId: string;
  /** ISO `YYYY-MM-DD`, or null when the source value is not a calendar date. */
  readonly date: string | null;
  readonly rawDate: string;
  readonly dailyTotal: number | null;
  readonly breakdown: Readonly<Record<string, number | null>>;
}

export interface NormalizeOptions {
  isRegionDataset: boolean;
  nationwideEntity?: string | undefined;
}

export interface NormalizedDataset {
  readonly records: readonly DonationRecord[];
  /** Nationwide rows removed from a region dataset. */
  readonly droppedAggregateRows: number;
  /** Missing or unparseable cells per source column, counted before cleaning. */
  readonly missingValues: Readonly<Record<string, number>>;
}

export type DonationDatasets = Record<DatasetKind, NormalizedDataset>;

// ─────────────────────────────────────────────────────────────────────────────
// Aggregates
// ─────────────────────────────────────────────────────────────────────────────

export type Granularity = 'day' | 'month' | 'year';

/** Map whose iteration order is the order of the result. */
export type OrderedTotals = ReadonlyMap<string, number>;

export interface PeriodSeries {
  readonly granularity: Granularity;
  readonly totals: OrderedTotals;
}

export type SortOrder = 'by_value_desc' | 'by_key_asc';

export type GroupKey<T> = (item: T) => string | null;
export type ValueSelector<T> = (item: T) => number | null;

export interface DescriptiveStats {
  count: number;
  mean: number;
  std: number;
  min: number;
  p25: number;
  p50: number;
  p75: number;
  max: number;
}

export interface ReconciliationRow {
  date: string;
  facilityTotal: number;
  regionTotal: number;
  difference: number;
  matched: boolean;
}

export interface DailyReconciliation {
  rows: ReconciliationRow[];
  summary: DescriptiveStats;
  mismatchCount: number;
  mismatchPreview: ReconciliationRow[];
}

export interface ReconcileOptions {
  previewLimit?: number | undefined;
}

export interface NumericAttribute {
  name: string;
  select: ValueSelector<DonationRecord>;
}

export interface CorrelationMatrix {
  attributes: string[];
  /** Row-major; NaN where the coefficient is undefined. */
  values: number[][];
}

// ─────────────────────────────────────────────────────────────────────────────
// Report
// ─────────────────────────────────────────────────────────────────────────────

export interface CategoryComparison {
  groupId: string;
  label: string;
  facility: OrderedTotals;
  region: OrderedTotals;
}

export interface DatasetSummary {
  recordCount: number;
  droppedAggregateRows: number;
  missingValues: Readonly<Record<string, number>>;
  statistics: ReadonlyMap<string, DescriptiveStats>;
  daily: PeriodSeries;
  monthly: PeriodSeries;
  yearly: PeriodSeries;
  correlation: CorrelationMatrix;
}

export interface DonationReport {
  reconciliation: DailyReconciliation;
  facility: DatasetSummary;
  region: DatasetSummary;
  topHospitals: OrderedTotals;
  yearlyByHospital: ReadonlyMap<string, OrderedTotals>;
  categories: CategoryComparison[];
}

export interface BuildDonationReportInput {
  previewLimit?: number | undefined;
  topHospitals?: number | undefined;
}

export const DEFAULT_TOP_HOSPITALS = 15;
