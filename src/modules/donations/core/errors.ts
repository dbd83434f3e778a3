/**
 * Domain error types for the donations module.
 */

import type { ValueError } from '@sinclair/typebox/errors';

import { createValidationError, type ValidationError } from '../../../common/types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

export type DonationInputError =
  | { type: 'InvalidInput'; message: string }
  | { type: 'MissingColumns'; message: string; columns: string[] };

export type DonationSourceError =
  | { type: 'NotFound'; message: string }
  | { type: 'ReadError'; message: string }
  | { type: 'ParseError'; message: string }
  | { type: 'SchemaValidationError'; message: string; details: string[] };

export type DonationError = DonationInputError | DonationSourceError | ValidationError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Factories
// ─────────────────────────────────────────────────────────────────────────────

export const createInvalidInputError = (message: string): DonationInputError => ({
  type: 'InvalidInput',
  message,
});

export const createMissingColumnsError = (columns: string[]): DonationInputError => ({
  type: 'MissingColumns',
  message: `Missing required column(s): ${columns.join(', ')}`,
  columns,
});

export { createValidationError };

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const DONATION_ERROR_HTTP_STATUS: Record<DonationError['type'], 400 | 404 | 500> = {
  InvalidInput: 400,
  MissingColumns: 400,
  ValidationError: 400,
  NotFound: 404,
  ReadError: 500,
  ParseError: 500,
  SchemaValidationError: 500,
};

export const getHttpStatusForError = (error: DonationError): 400 | 404 | 500 =>
  DONATION_ERROR_HTTP_STATUS[error.type];
