/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { createChildLogger, createLogger, prettyTransport } from './infra/logger/index.js';
import { createCsvDonationSource, loadDonationConfig } from './modules/donations/index.js';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info({ config: { server: config.server } }, 'Starting API server');

  // The config file is required up front; the datasets themselves load on first request
  const donationConfig = await loadDonationConfig({
    configPath: config.donations.configPath,
    dataDir: config.donations.dataDir,
  });
  if (donationConfig.isErr()) {
    const details = 'details' in donationConfig.error ? donationConfig.error.details : undefined;
    logger.fatal({ error: donationConfig.error.type, details }, donationConfig.error.message);
    process.exit(1);
  }

  const donationSource = createCsvDonationSource({
    config: donationConfig.value,
    logger: createChildLogger(logger, { module: 'donations' }),
  });

  // Build application - let Fastify create its own logger based on config
  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && { transport: prettyTransport }),
      },
      disableRequestLogging: false,
    },
    deps: {
      config,
      donationConfig: donationConfig.value,
      donationSource,
    },
    version: process.env['APP_VERSION'] ?? '0.1.0',
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
