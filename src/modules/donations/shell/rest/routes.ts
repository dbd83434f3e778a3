/**
 * Donations Module REST Routes
 *
 * Read-only endpoints over the facility and region datasets.
 * - GET /api/v1/donations/reconciliation: facility vs region daily totals
 * - GET /api/v1/donations/periods: totals per day, month or year
 * - GET /api/v1/donations/groups: totals per entity, period or breakdown group
 * - GET /api/v1/donations/correlation: Pearson matrix of numeric attributes
 * - GET /api/v1/donations/report: everything above in one document
 */

import { type Result } from 'neverthrow';

import {
  CorrelationQuerySchema,
  CorrelationResponseSchema,
  ErrorResponseSchema,
  GroupsQuerySchema,
  GroupsResponseSchema,
  PeriodsQuerySchema,
  PeriodsResponseSchema,
  ReconciliationQuerySchema,
  ReconciliationResponseSchema,
  ReportQuerySchema,
  ReportResponseSchema,
  type CorrelationQuery,
  type GroupsQuery,
  type PeriodsQuery,
  type ReconciliationQuery,
  type ReportQuery,
} from './schemas.js';
import {
  toCorrelationDTO,
  toReconciliationDTO,
  toReportDTO,
  toTotalEntries,
} from './serialize.js';
import { getHttpStatusForError, type DonationError } from '../../core/errors.js';
import { aggregateByPeriod } from '../../core/usecases/aggregate-by-period.js';
import { buildDonationReport } from '../../core/usecases/build-donation-report.js';
import { correlationMatrix, numericAttributes } from '../../core/usecases/correlation-matrix.js';
import { getGroupTotals } from '../../core/usecases/get-group-totals.js';
import { loadDonationDatasets } from '../../core/usecases/load-donation-datasets.js';
import { reconcileDailyTotals } from '../../core/usecases/reconcile-daily-totals.js';

import type { DonationSource } from '../../core/ports.js';
import type { DonationConfig, DonationDatasets } from '../../core/types.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for donation routes.
 */
export interface MakeDonationRoutesDeps {
  source: DonationSource;
  config: DonationConfig;
  /** Mismatched dates listed when the request does not say */
  defaultPreviewLimit: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function sendError(reply: FastifyReply, error: DonationError) {
  return reply.status(getHttpStatusForError(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });
}

const errorResponses = {
  400: ErrorResponseSchema,
  404: ErrorResponseSchema,
  500: ErrorResponseSchema,
};

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates donation REST routes.
 * Datasets are read and normalized once, on the first request that needs them.
 */
export const makeDonationRoutes = (deps: MakeDonationRoutesDeps): FastifyPluginAsync => {
  const { source, config, defaultPreviewLimit } = deps;

  let datasetsPromise: Promise<Result<DonationDatasets, DonationError>> | null = null;

  const ensureDatasets = async (): Promise<Result<DonationDatasets, DonationError>> => {
    datasetsPromise ??= loadDonationDatasets({ source, config });

    const result = await datasetsPromise;
    if (result.isErr()) {
      // Let the next request retry
      datasetsPromise = null;
    }

    return result;
  };

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/donations/reconciliation
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: ReconciliationQuery }>(
      '/api/v1/donations/reconciliation',
      {
        schema: {
          querystring: ReconciliationQuerySchema,
          response: { 200: ReconciliationResponseSchema, ...errorResponses },
        },
      },
      async (request, reply) => {
        const loaded = await ensureDatasets();
        if (loaded.isErr()) return sendError(reply, loaded.error);

        const reconciliation = reconcileDailyTotals(
          aggregateByPeriod(loaded.value.facility.records, 'day'),
          aggregateByPeriod(loaded.value.region.records, 'day'),
          { previewLimit: request.query.previewLimit ?? defaultPreviewLimit }
        );
        if (reconciliation.isErr()) return sendError(reply, reconciliation.error);

        request.log.info(
          { mismatchCount: reconciliation.value.mismatchCount },
          'Daily totals reconciled'
        );

        return reply.status(200).send({
          ok: true,
          data: toReconciliationDTO(reconciliation.value),
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/donations/periods
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: PeriodsQuery }>(
      '/api/v1/donations/periods',
      {
        schema: {
          querystring: PeriodsQuerySchema,
          response: { 200: PeriodsResponseSchema, ...errorResponses },
        },
      },
      async (request, reply) => {
        const loaded = await ensureDatasets();
        if (loaded.isErr()) return sendError(reply, loaded.error);

        const { dataset, granularity } = request.query;
        const series = aggregateByPeriod(loaded.value[dataset].records, granularity);

        return reply.status(200).send({
          ok: true,
          data: { dataset, granularity, totals: toTotalEntries(series.totals) },
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/donations/groups
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: GroupsQuery }>(
      '/api/v1/donations/groups',
      {
        schema: {
          querystring: GroupsQuerySchema,
          response: { 200: GroupsResponseSchema, ...errorResponses },
        },
      },
      async (request, reply) => {
        const loaded = await ensureDatasets();
        if (loaded.isErr()) return sendError(reply, loaded.error);

        const { dataset, dimension, limit } = request.query;
        const totals = getGroupTotals(loaded.value[dataset].records, config.breakdownGroups, {
          dimension,
          limit,
        });
        if (totals.isErr()) return sendError(reply, totals.error);

        return reply.status(200).send({
          ok: true,
          data: { dataset, dimension, totals: toTotalEntries(totals.value) },
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/donations/correlation
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: CorrelationQuery }>(
      '/api/v1/donations/correlation',
      {
        schema: {
          querystring: CorrelationQuerySchema,
          response: { 200: CorrelationResponseSchema, ...errorResponses },
        },
      },
      async (request, reply) => {
        const loaded = await ensureDatasets();
        if (loaded.isErr()) return sendError(reply, loaded.error);

        const { dataset } = request.query;
        const matrix = correlationMatrix(
          loaded.value[dataset].records,
          numericAttributes(config.datasets[dataset].schema)
        );

        return reply.status(200).send({ ok: true, data: toCorrelationDTO(matrix) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/donations/report
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: ReportQuery }>(
      '/api/v1/donations/report',
      {
        schema: {
          querystring: ReportQuerySchema,
          response: { 200: ReportResponseSchema, ...errorResponses },
        },
      },
      async (request, reply) => {
        const loaded = await ensureDatasets();
        if (loaded.isErr()) return sendError(reply, loaded.error);

        const report = buildDonationReport(loaded.value, config, {
          previewLimit: request.query.previewLimit ?? defaultPreviewLimit,
          topHospitals: request.query.topHospitals,
        });
        if (report.isErr()) return sendError(reply, report.error);

        return reply.status(200).send({ ok: true, data: toReportDTO(report.value) });
      }
    );
  };
};
