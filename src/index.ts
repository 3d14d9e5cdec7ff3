/**
 * Bio-T configuration snapshot transfer
 */

export * from './modules/snapshot-transfer/index.js';
export * from './common/types/index.js';
export {
  makeBiotHttpClient,
  healthCheckEndpointFor,
  HEALTH_CHECK_ENDPOINTS,
  LOGIN_ENDPOINT,
  FILE_UPLOAD_ENDPOINT,
  type BiotHttpClient,
  type BiotHttpClientOptions,
  type FetchFn,
  type HttpMethod,
  type UploadedFile,
} from './infra/http/biot-client.js';
export { createLogger, type Logger, type LoggerConfig, type LogLevel } from './infra/logger/index.js';
export { parseEnv, createConfig, EnvSchema, type Env, type AppConfig } from './infra/config/env.js';
