import type { Result } from 'neverthrow';

import type { DonationSourceError } from './errors.js';
import type { DatasetKind, RawRow } from './types.js';

export interface DonationSource {
  /**
   * Raw rows of one dataset, exactly as the loader read them.
   */
  loadRaw(dataset: DatasetKind): Promise<Result<RawRow[], DonationSourceError>>;
}
