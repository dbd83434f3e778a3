/**
 * Donations REST API - TypeBox Schemas
 *
 * Request/response validation schemas for the REST API.
 * Coefficients and statistics that are undefined (NaN) are sent as null.
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

const DatasetKindSchema = Type.Union([Type.Literal('facility'), Type.Literal('region')]);

const GranularitySchema = Type.Union([
  Type.Literal('day'),
  Type.Literal('month'),
  Type.Literal('year'),
]);

export const ReconciliationQuerySchema = Type.Object(
  {
    previewLimit: Type.Optional(Type.Integer({ minimum: 0, maximum: 1000 })),
  },
  { additionalProperties: false }
);

export type ReconciliationQuery = Static<typeof ReconciliationQuerySchema>;

export const PeriodsQuerySchema = Type.Object(
  {
    dataset: DatasetKindSchema,
    granularity: GranularitySchema,
  },
  { additionalProperties: false }
);

export type PeriodsQuery = Static<typeof PeriodsQuerySchema>;

export const GroupsQuerySchema = Type.Object(
  {
    dataset: DatasetKindSchema,
    dimension: Type.String({
      minLength: 1,
      description: "'entity', 'year', 'month' or the id of a breakdown group",
    }),
    limit: Type.Optional(Type.Integer({ minimum: 1 })),
  },
  { additionalProperties: false }
);

export type GroupsQuery = Static<typeof GroupsQuerySchema>;

export const CorrelationQuerySchema = Type.Object(
  {
    dataset: DatasetKindSchema,
  },
  { additionalProperties: false }
);

export type CorrelationQuery = Static<typeof CorrelationQuerySchema>;

export const ReportQuerySchema = Type.Object(
  {
    previewLimit: Type.Optional(Type.Integer({ minimum: 0, maximum: 1000 })),
    topHospitals: Type.Optional(Type.Integer({ minimum: 1 })),
  },
  { additionalProperties: false }
);

export type ReportQuery = Static<typeof ReportQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const NullableNumber = Type.Union([Type.Number(), Type.Null()]);

export const TotalEntrySchema = Type.Object({
  key: Type.String(),
  total: Type.Number(),
});

export type TotalEntry = Static<typeof TotalEntrySchema>;

export const DescriptiveStatsSchema = Type.Object({
  count: Type.Integer(),
  mean: NullableNumber,
  std: NullableNumber,
  min: NullableNumber,
  p25: NullableNumber,
  p50: NullableNumber,
  p75: NullableNumber,
  max: NullableNumber,
});

export type DescriptiveStatsDTO = Static<typeof DescriptiveStatsSchema>;

export const ReconciliationRowSchema = Type.Object({
  date: Type.String(),
  facilityTotal: Type.Number(),
  regionTotal: Type.Number(),
  difference: Type.Number(),
  matched: Type.Boolean(),
});

export const ReconciliationSchema = Type.Object({
  dateCount: Type.Integer(),
  mismatchCount: Type.Integer(),
  summary: DescriptiveStatsSchema,
  mismatchPreview: Type.Array(ReconciliationRowSchema),
  rows: Type.Array(ReconciliationRowSchema),
});

export type ReconciliationDTO = Static<typeof ReconciliationSchema>;

export const CorrelationMatrixSchema = Type.Object({
  attributes: Type.Array(Type.String()),
  values: Type.Array(Type.Array(NullableNumber)),
});

export type CorrelationMatrixDTO = Static<typeof CorrelationMatrixSchema>;

const DatasetSummarySchema = Type.Object({
  recordCount: Type.Integer(),
  droppedAggregateRows: Type.Integer(),
  missingValues: Type.Record(Type.String(), Type.Integer()),
  statistics: Type.Array(Type.Object({ attribute: Type.String(), stats: DescriptiveStatsSchema })),
  daily: Type.Array(TotalEntrySchema),
  monthly: Type.Array(TotalEntrySchema),
  yearly: Type.Array(TotalEntrySchema),
  correlation: CorrelationMatrixSchema,
});

export type DatasetSummaryDTO = Static<typeof DatasetSummarySchema>;

export const ReportSchema = Type.Object({
  reconciliation: ReconciliationSchema,
  facility: DatasetSummarySchema,
  region: DatasetSummarySchema,
  topHospitals: Type.Array(TotalEntrySchema),
  yearlyByHospital: Type.Array(
    Type.Object({ hospital: Type.String(), years: Type.Array(TotalEntrySchema) })
  ),
  categories: Type.Array(
    Type.Object({
      groupId: Type.String(),
      label: Type.String(),
      facility: Type.Array(TotalEntrySchema),
      region: Type.Array(TotalEntrySchema),
    })
  ),
});

export type ReportDTO = Static<typeof ReportSchema>;

const okResponse = <T extends TSchema>(data: T) =>
  Type.Object({ ok: Type.Literal(true), data });

export const ReconciliationResponseSchema = okResponse(ReconciliationSchema);

export const PeriodsResponseSchema = okResponse(
  Type.Object({
    dataset: DatasetKindSchema,
    granularity: GranularitySchema,
    totals: Type.Array(TotalEntrySchema),
  })
);

export const GroupsResponseSchema = okResponse(
  Type.Object({
    dataset: DatasetKindSchema,
    dimension: Type.String(),
    totals: Type.Array(TotalEntrySchema),
  })
);

export const CorrelationResponseSchema = okResponse(CorrelationMatrixSchema);

export const ReportResponseSchema = okResponse(ReportSchema);

/**
 * Error response schema.
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.String({ description: 'Human-readable error message' }),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
