import fs from 'node:fs/promises';
import path from 'node:path';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { formatSchemaErrors, type DonationSourceError } from '../../core/errors.js';
import {
  DEFAULT_NATIONWIDE_ENTITY,
  DonationConfigFileSchema,
  type DonationConfig,
  type DonationConfigFileDTO,
} from '../../core/types.js';

const validator = TypeCompiler.Compile(DonationConfigFileSchema);

export interface LoadDonationConfigOptions {
  configPath: string;
  /** Directory that `datasets.*.file` paths resolve against */
  dataDir: string;
}

/**
 * Every breakdown group must only name columns that both datasets declare.
 */
const findUndeclaredColumns = (dto: DonationConfigFileDTO): string[] => {
  const details: string[] = [];

  for (const [kind, source] of Object.entries(dto.datasets)) {
    const declared = new Set(source.columns.breakdownColumns);
    for (const group of dto.breakdownGroups) {
      for (const { column } of group.categories) {
        if (!declared.has(column)) {
          details.push(
            `/breakdownGroups/${group.id}: column '${column}' is not a breakdown column of the ${kind} dataset`
          );
        }
      }
    }
  }

  return details;
};

export const loadDonationConfig = async (
  options: LoadDonationConfigOptions
): Promise<Result<DonationConfig, DonationSourceError>> => {
  const { configPath, dataDir } = options;
  let contents: string;

  try {
    contents = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err({
        type: 'NotFound',
        message: `Donation config not found at ${configPath}`,
      });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read donation config at ${configPath}: ${(error as Error).message}`,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse YAML at ${configPath}: ${(error as Error).message}`,
    });
  }

  if (!validator.Check(parsed)) {
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${configPath}`,
      details: formatSchemaErrors(validator.Errors(parsed)),
    });
  }

  const undeclared = findUndeclaredColumns(parsed);
  if (undeclared.length > 0) {
    return err({
      type: 'SchemaValidationError',
      message: `Breakdown groups reference undeclared columns in ${configPath}`,
      details: undeclared,
    });
  }

  const { facility, region } = parsed.datasets;

  return ok({
    nationwideEntity: parsed.nationwideEntity ?? DEFAULT_NATIONWIDE_ENTITY,
    datasets: {
      facility: { filePath: path.resolve(dataDir, facility.file), schema: facility.columns },
      region: { filePath: path.resolve(dataDir, region.file), schema: region.columns },
    },
    breakdownGroups: parsed.breakdownGroups,
  });
};
