/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { registerCors } from '../infra/plugins/index.js';
import {
  makeDonationRoutes,
  type DonationConfig,
  type DonationSource,
} from '../modules/donations/index.js';
import {
  makeFsFileProbe,
  makeHealthRoutes,
  type SourceFileProbe,
} from '../modules/health/index.js';

import type { AppConfig } from '../infra/config/env.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  donationConfig: DonationConfig;
  donationSource: DonationSource;
  /** Readiness probe for the config and dataset files; defaults to the filesystem */
  fileProbe?: SourceFileProbe;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>; // Allow partial for tests/defaults, but runtime needs them
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;

  if (
    deps.config === undefined ||
    deps.donationConfig === undefined ||
    deps.donationSource === undefined
  ) {
    throw new Error('Missing required dependencies: config, donationConfig, donationSource');
  }

  const config = deps.config;

  const app = fastifyLib({
    ...fastifyOptions,
  });

  // Global error handler, set before any plugin loads so encapsulated routes inherit it
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    // Handle unexpected errors
    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  await registerCors(app, config);

  await app.register(
    makeHealthRoutes({
      version,
      probe: deps.fileProbe ?? makeFsFileProbe(),
      files: [
        { kind: 'config', path: config.donations.configPath },
        { kind: 'facility', path: deps.donationConfig.datasets.facility.filePath },
        { kind: 'region', path: deps.donationConfig.datasets.region.filePath },
      ],
    })
  );

  // ─────────────────────────────────────────────────────────────────────────────
  // Setup Donations Module (REST API)
  // ─────────────────────────────────────────────────────────────────────────────
  await app.register(
    makeDonationRoutes({
      source: deps.donationSource,
      config: deps.donationConfig,
      defaultPreviewLimit: config.donations.mismatchPreviewLimit,
    })
  );

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
