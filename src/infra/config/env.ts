/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Donation datasets
  DONATIONS_CONFIG_PATH: Type.String({ minLength: 1, default: 'config/donations.yaml' }),
  DONATIONS_DATA_DIR: Type.String({ minLength: 1, default: 'data' }),
  MISMATCH_PREVIEW_LIMIT: Type.Integer({ default: 10, minimum: 0 }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const parseInteger = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number(value) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseInteger(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DONATIONS_CONFIG_PATH: env['DONATIONS_CONFIG_PATH'] ?? 'config/donations.yaml',
    DONATIONS_DATA_DIR: env['DONATIONS_DATA_DIR'] ?? 'data',
    MISMATCH_PREVIEW_LIMIT: parseInteger(env['MISMATCH_PREVIEW_LIMIT'], 10),
    ...(env['ALLOWED_ORIGINS'] !== undefined && { ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'] }),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  donations: {
    configPath: env.DONATIONS_CONFIG_PATH,
    /** Directory that dataset file paths resolve against */
    dataDir: env.DONATIONS_DATA_DIR,
    mismatchPreviewLimit: env.MISMATCH_PREVIEW_LIMIT,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
