export type { CompletionClient, CompleteOptions, DescribeImageOptions, OutputOptions } from './types.js';
export type { ClientDependencies } from './client-impl.js';
export { CompletionClientImpl } from './client-impl.js';
export type { EnvClientDependencies } from './factory.js';
export { createClient, createClientFromEnv } from './factory.js';
export type { ClientConfig, NormalizedConfig } from './config.js';
export {
  validateConfig,
  normalizeConfig,
  configFromEnv,
  DEFAULT_CONFIG,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  DEFAULT_STREAM_IDLE_TIMEOUT,
  DEFAULT_REFERER,
  DEFAULT_TITLE,
} from './config.js';
