import { err, ok, type Result } from 'neverthrow';

import {
  createInvalidInputError,
  createMissingColumnsError,
  type DonationInputError,
} from '../errors.js';
import { DEFAULT_NATIONWIDE_ENTITY, UNKNOWN_ENTITY } from '../types.js';

import type {
  DatasetSchema,
  DonationRecord,
  NormalizedDataset,
  NormalizeOptions,
  RawRow,
} from '../types.js';

const DATE_RE =
  /^(\d{4})([-/])(\d{2})\2(\d{2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

const daysInMonth = (year: number, month: number): number =>
  new Date(Date.UTC(year, month, 0)).getUTCDate();

/**
 * Parses a source date into `YYYY-MM-DD`.
 * Returns null for anything that is not an existing calendar date.
 */
export const parseCalendarDate = (value: unknown): string | null => {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString().slice(0, 10);
  }
  if (typeof value !== 'string') return null;

  const match = DATE_RE.exec(value.trim());
  if (match === null) return null;

  const [, yearText = '', , monthText = '', dayText = ''] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);

  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }

  return `${yearText}-${monthText}-${dayText}`;
};

const COUNT_PATTERN = /^[+-]?\d+(\.0+)?$/;

/**
 * Parses a count cell. Counts are whole numbers written in decimal; a trailing
 * `.0` is accepted. Empty cells and anything else (fractions, exponents, hex)
 * are missing (null).
 */
export const parseCount = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  if (!COUNT_PATTERN.test(trimmed)) return null;

  return Number(trimmed);
};

const parseEntity = (value: unknown): string | null => {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
};

const toRawText = (value: unknown): string => {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string' || typeof value === 'number') return String(value);
  return '';
};

const isRawRow = (value: unknown): value is RawRow =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const requiredColumns = (schema: DatasetSchema): string[] => [
  ...new Set([
    schema.entityColumn,
    schema.dateColumn,
    schema.totalColumn,
    ...schema.breakdownColumns,
  ]),
];

/**
 * Cleans one raw dataset.
 *
 * - Unparseable dates become `date: null`; the row is kept.
 * - A missing entity becomes {@link UNKNOWN_ENTITY}.
 * - For a region dataset, rows naming the nationwide entity are dropped.
 *
 * Fails when the input is not a list of rows or a schema column is absent.
 */
export const normalizeRecords = (
  rows: unknown,
  schema: DatasetSchema,
  options: NormalizeOptions
): Result<NormalizedDataset, DonationInputError> => {
  if (!Array.isArray(rows)) {
    return err(createInvalidInputError('Expected a list of rows'));
  }

  const columns = requiredColumns(schema);
  const missingColumns = new Set<string>();
  const checkedRows: RawRow[] = [];

  for (const [index, row] of rows.entries()) {
    if (!isRawRow(row)) {
      return err(createInvalidInputError(`Row ${String(index)} is not an object`));
    }
    for (const column of columns) {
      if (!(column in row)) missingColumns.add(column);
    }
    checkedRows.push(row);
  }

  if (missingColumns.size > 0) {
    return err(createMissingColumnsError(columns.filter((c) => missingColumns.has(c))));
  }

  const nationwide = (options.nationwideEntity ?? DEFAULT_NATIONWIDE_ENTITY).trim().toLowerCase();
  const missingValues: Record<string, number> = Object.fromEntries(columns.map((c) => [c, 0]));
  const countMissing = (column: string): void => {
    missingValues[column] = (missingValues[column] ?? 0) + 1;
  };

  const records: DonationRecord[] = [];
  let droppedAggregateRows = 0;

  for (const row of checkedRows) {
    const entity = parseEntity(row[schema.entityColumn]);

    if (options.isRegionDataset && entity?.toLowerCase() === nationwide) {
      droppedAggregateRows += 1;
      continue;
    }

    const rawDate = row[schema.dateColumn];
    const date = parseCalendarDate(rawDate);
    const dailyTotal = parseCount(row[schema.totalColumn]);

    if (entity === null) countMissing(schema.entityColumn);
    if (date === null) countMissing(schema.dateColumn);
    if (dailyTotal === null) countMissing(schema.totalColumn);

    const breakdown: Record<string, number | null> = {};
    for (const column of schema.breakdownColumns) {
      const count = parseCount(row[column]);
      if (count === null) countMissing(column);
      breakdown[column] = count;
    }

    records.push({
      entityId: entity ?? UNKNOWN_ENTITY,
      date,
      rawDate: toRawText(rawDate),
      dailyTotal,
      breakdown,
    });
  }

  return ok({ records, droppedAggregateRows, missingValues });
};
