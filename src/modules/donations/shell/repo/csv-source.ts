import fs from 'node:fs/promises';

import { parse as parseCsv } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import type { DonationSourceError } from '../../core/errors.js';
import type { DonationSource } from '../../core/ports.js';
import type { DatasetKind, DonationConfig, RawRow } from '../../core/types.js';
import type { Logger } from 'pino';

export interface CsvDonationSourceOptions {
  config: DonationConfig;
  logger: Logger;
}

const isRawRow = (value: unknown): value is RawRow =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Parses CSV text with a header line into one object per row.
 * Cells stay strings; empty cells are empty strings.
 */
export const parseCsvRows = (contents: string): Result<RawRow[], DonationSourceError> => {
  let parsed: unknown;

  try {
    parsed = parseCsv(contents, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse CSV: ${(error as Error).message}`,
    });
  }

  if (!Array.isArray(parsed)) {
    return err({ type: 'ParseError', message: 'CSV parser did not return a list of rows' });
  }

  return ok(parsed.filter(isRawRow));
};

export const createCsvDonationSource = (options: CsvDonationSourceOptions): DonationSource => {
  const { config, logger } = options;

  return {
    async loadRaw(dataset: DatasetKind): Promise<Result<RawRow[], DonationSourceError>> {
      const filePath = config.datasets[dataset].filePath;
      let contents: string;

      try {
        contents = await fs.readFile(filePath, 'utf8');
      } catch (error) {
        const code = (error as NodeJS.ErrnoException).code;
        logger.warn({ dataset, filePath, code }, 'Failed to read donation dataset');

        if (code === 'ENOENT') {
          return err({
            type: 'NotFound',
            message: `The ${dataset} dataset was not found at ${filePath}`,
          });
        }

        return err({
          type: 'ReadError',
          message: `Failed to read the ${dataset} dataset at ${filePath}: ${(error as Error).message}`,
        });
      }

      const rows = parseCsvRows(contents);
      if (rows.isErr()) {
        logger.warn({ dataset, filePath }, rows.error.message);
        return err({ ...rows.error, message: `${filePath}: ${rows.error.message}` });
      }

      logger.debug({ dataset, filePath, rows: rows.value.length }, 'Loaded donation dataset');
      return ok(rows.value);
    },
  };
};
