/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/** Historical lower bound used by configuration exports */
export const DEFAULT_SNAPSHOT_SINCE = '2024-05-01T09:03:33Z';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

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

  // Bio-T API
  BIOT_BASE_URL: Type.String({ minLength: 1 }),
  BIOT_USERNAME: Type.Optional(Type.String()),
  BIOT_PASSWORD: Type.Optional(Type.String()),
  BIOT_TOKEN: Type.Optional(Type.String()),
  BIOT_ALLOW_DELETE: Type.Boolean({ default: false }),

  // Snapshot transfer
  SNAPSHOT_SINCE: Type.String({ minLength: 1, default: DEFAULT_SNAPSHOT_SINCE }),
  SNAPSHOT_IMPORT_CONCURRENCY: Type.Integer({ minimum: 1, maximum: 32, default: 1 }),
  SNAPSHOT_REPORTS_DIR: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const parseBoolean = (value: string | undefined): boolean =>
  value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase());

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const concurrency = env['SNAPSHOT_IMPORT_CONCURRENCY'];

  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    BIOT_BASE_URL: env['BIOT_BASE_URL'],
    BIOT_USERNAME: env['BIOT_USERNAME'],
    BIOT_PASSWORD: env['BIOT_PASSWORD'],
    BIOT_TOKEN: env['BIOT_TOKEN'],
    BIOT_ALLOW_DELETE: parseBoolean(env['BIOT_ALLOW_DELETE']),
    SNAPSHOT_SINCE: env['SNAPSHOT_SINCE'] ?? DEFAULT_SNAPSHOT_SINCE,
    SNAPSHOT_IMPORT_CONCURRENCY:
      concurrency !== undefined && concurrency !== '' ? Number.parseInt(concurrency, 10) : 1,
    SNAPSHOT_REPORTS_DIR: env['SNAPSHOT_REPORTS_DIR'],
  };

  // Optional keys must be absent rather than undefined for the schema check
  const cleaned = Object.fromEntries(
    Object.entries(rawEnv).filter(([, value]) => value !== undefined)
  );

  if (!Value.Check(EnvSchema, cleaned)) {
    const errors = [...Value.Errors(EnvSchema, cleaned)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  if (Number.isNaN(Date.parse(cleaned.SNAPSHOT_SINCE))) {
    throw new Error(
      `Invalid environment configuration: /SNAPSHOT_SINCE: '${cleaned.SNAPSHOT_SINCE}' is not an ISO 8601 timestamp`
    );
  }

  return cleaned;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV === 'development',
  },
  biot: {
    baseUrl: env.BIOT_BASE_URL.replace(/\/+$/, ''),
    username: env.BIOT_USERNAME,
    password: env.BIOT_PASSWORD,
    token: env.BIOT_TOKEN,
    allowDelete: env.BIOT_ALLOW_DELETE,
  },
  snapshot: {
    since: env.SNAPSHOT_SINCE,
    importConcurrency: env.SNAPSHOT_IMPORT_CONCURRENCY,
    reportsDir: env.SNAPSHOT_REPORTS_DIR,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
