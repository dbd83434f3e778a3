import { parseEnv, createConfig } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';
import {
  buildDonationReport,
  createCsvDonationSource,
  formatReconciliation,
  loadDonationConfig,
  loadDonationDatasets,
  toReportDTO,
  type DonationError,
  type DonationReport,
} from '../src/modules/donations/index.js';

const formatError = (error: DonationError): string => {
  if (error.type === 'SchemaValidationError' && error.details.length > 0) {
    return `${error.message}\n  - ${error.details.join('\n  - ')}`;
  }
  return error.message;
};

const formatOverview = (report: DonationReport): string => {
  const lines: string[] = [];

  for (const [kind, summary] of [
    ['facility', report.facility],
    ['region', report.region],
  ] as const) {
    lines.push(`--- ${kind} dataset ---`);
    lines.push(`Records: ${String(summary.recordCount)}`);
    if (summary.droppedAggregateRows > 0) {
      lines.push(`Nationwide rows dropped: ${String(summary.droppedAggregateRows)}`);
    }
    const missing = Object.entries(summary.missingValues).filter(([, count]) => count > 0);
    lines.push(
      missing.length > 0
        ? `Missing values: ${missing.map(([column, count]) => `${column}=${String(count)}`).join(', ')}`
        : 'Missing values: none'
    );
    lines.push('');
  }

  return lines.join('\n');
};

const main = async (): Promise<void> => {
  const asJson = process.argv.slice(2).includes('--json');

  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({
    level: config.logger.level,
    name: 'reconcile-donations',
    pretty: config.logger.pretty,
  });

  const donationConfig = await loadDonationConfig({
    configPath: config.donations.configPath,
    dataDir: config.donations.dataDir,
  });
  if (donationConfig.isErr()) {
    console.error(formatError(donationConfig.error));
    process.exit(1);
  }

  const source = createCsvDonationSource({ config: donationConfig.value, logger });
  const datasets = await loadDonationDatasets({ source, config: donationConfig.value });
  if (datasets.isErr()) {
    console.error(formatError(datasets.error));
    process.exit(1);
  }

  const report = buildDonationReport(datasets.value, donationConfig.value, {
    previewLimit: config.donations.mismatchPreviewLimit,
  });
  if (report.isErr()) {
    console.error(formatError(report.error));
    process.exit(1);
  }

  logger.info({ mismatchCount: report.value.reconciliation.mismatchCount }, 'Reconciliation done');

  if (asJson) {
    console.log(JSON.stringify(toReportDTO(report.value), null, 2));
    return;
  }

  console.log(formatOverview(report.value));
  console.log(formatReconciliation(report.value.reconciliation));
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
