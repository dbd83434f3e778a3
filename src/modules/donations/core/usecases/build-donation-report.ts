import { err, ok, type Result } from 'neverthrow';

import { aggregateByPeriod } from './aggregate-by-period.js';
import { correlationMatrix, numericAttributes } from './correlation-matrix.js';
import { describeAttributes } from './describe-values.js';
import { byEntity, byYear, categorySum, dailyTotal, groupSum, pivotSum, topN } from './group-sum.js';
import { reconcileDailyTotals } from './reconcile-daily-totals.js';
import { DEFAULT_TOP_HOSPITALS } from '../types.js';

import type { ValidationError } from '../../../../common/types/errors.js';
import type {
  BuildDonationReportInput,
  DatasetSchema,
  DatasetSummary,
  DonationConfig,
  DonationDatasets,
  DonationReport,
  NormalizedDataset,
} from '../types.js';

const summarizeDataset = (dataset: NormalizedDataset, schema: DatasetSchema): DatasetSummary => {
  const attributes = numericAttributes(schema);

  return {
    recordCount: dataset.records.length,
    droppedAggregateRows: dataset.droppedAggregateRows,
    missingValues: dataset.missingValues,
    statistics: describeAttributes(dataset.records, attributes),
    daily: aggregateByPeriod(dataset.records, 'day'),
    monthly: aggregateByPeriod(dataset.records, 'month'),
    yearly: aggregateByPeriod(dataset.records, 'year'),
    correlation: correlationMatrix(dataset.records, attributes),
  };
};

/**
 * Full analysis of a normalized facility/region pair:
 * the daily reconciliation, a summary per dataset, the hospital ranking,
 * yearly totals per hospital and every breakdown group side by side.
 */
export const buildDonationReport = (
  datasets: DonationDatasets,
  config: DonationConfig,
  input: BuildDonationReportInput = {}
): Result<DonationReport, ValidationError> => {
  const facility = summarizeDataset(datasets.facility, config.datasets.facility.schema);
  const region = summarizeDataset(datasets.region, config.datasets.region.schema);

  const reconciliation = reconcileDailyTotals(facility.daily, region.daily, {
    previewLimit: input.previewLimit,
  });
  if (reconciliation.isErr()) return err(reconciliation.error);

  const facilityRecords = datasets.facility.records;
  const hospitalTotals = groupSum(facilityRecords, byEntity, dailyTotal, 'by_value_desc');

  return ok({
    reconciliation: reconciliation.value,
    facility,
    region,
    topHospitals: topN(hospitalTotals, input.topHospitals ?? DEFAULT_TOP_HOSPITALS),
    yearlyByHospital: pivotSum(facilityRecords, byEntity, byYear, dailyTotal),
    categories: config.breakdownGroups.map((group) => ({
      groupId: group.id,
      label: group.label,
      facility: categorySum(facilityRecords, group, 'by_key_asc'),
      region: categorySum(datasets.region.records, group, 'by_key_asc'),
    })),
  });
};
