import { err, ok, type Result } from 'neverthrow';

import { normalizeRecords } from './normalize-records.js';

import type { DonationError } from '../errors.js';
import type { DonationSource } from '../ports.js';
import type { DonationConfig, DonationDatasets } from '../types.js';

export interface LoadDonationDatasetsDeps {
  source: DonationSource;
  config: DonationConfig;
}

/**
 * Loads both datasets in parallel and normalizes each one.
 * The nationwide entity is removed from the region dataset only.
 */
export const loadDonationDatasets = async (
  deps: LoadDonationDatasetsDeps
): Promise<Result<DonationDatasets, DonationError>> => {
  const { source, config } = deps;

  const [facilityRaw, regionRaw] = await Promise.all([
    source.loadRaw('facility'),
    source.loadRaw('region'),
  ]);

  if (facilityRaw.isErr()) return err(facilityRaw.error);
  if (regionRaw.isErr()) return err(regionRaw.error);

  const facility = normalizeRecords(facilityRaw.value, config.datasets.facility.schema, {
    isRegionDataset: false,
  });
  if (facility.isErr()) return err(facility.error);

  const region = normalizeRecords(regionRaw.value, config.datasets.region.schema, {
    isRegionDataset: true,
    nationwideEntity: config.nationwideEntity,
  });
  if (region.isErr()) return err(region.error);

  return ok({ facility: facility.value, region: region.value });
};
