import { z } from 'zod';
import { CallerError } from '../errors/categories.js';
import { LOG_LEVELS, isLogLevel, type LogLevel } from '../observability/logging.js';
import { DEFAULT_MODEL } from '../settings/model-settings.js';

export const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_TIMEOUT = 120_000;
/** Longest silence tolerated between two chunks of a streamed response. */
export const DEFAULT_STREAM_IDLE_TIMEOUT = 300_000;
export const DEFAULT_REFERER = 'https://www.npmjs.com/package/openrouter-prompt';
export const DEFAULT_TITLE = 'openrouter-prompt';

export interface ClientConfig {
  baseUrl?: string;
  timeout?: number;
  streamIdleTimeout?: number;
  /** Sent as `HTTP-Referer` for app attribution. */
  referer?: string;
  /** Sent as `X-Title` for app attribution. */
  title?: string;
  defaultModel?: string;
  logLevel?: LogLevel;
}

export type NormalizedConfig = Required<ClientConfig>;

export const DEFAULT_CONFIG: NormalizedConfig = {
  baseUrl: DEFAULT_BASE_URL,
  timeout: DEFAULT_TIMEOUT,
  streamIdleTimeout: DEFAULT_STREAM_IDLE_TIMEOUT,
  referer: DEFAULT_REFERER,
  title: DEFAULT_TITLE,
  defaultModel: DEFAULT_MODEL,
  logLevel: 'info',
};

const configSchema = z.object({
  baseUrl: z.string().url(),
  timeout: z.number().int().positive(),
  streamIdleTimeout: z.number().int().positive(),
  referer: z.string().min(1),
  title: z.string().min(1),
  defaultModel: z.string().trim().min(1),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
});

export function validateConfig(config: NormalizedConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new CallerError(`Invalid configuration: ${issues.join(', ')}`);
  }
}

export function normalizeConfig(config: ClientConfig = {}): NormalizedConfig {
  const normalized: NormalizedConfig = {
    baseUrl: config.baseUrl ?? DEFAULT_CONFIG.baseUrl,
    timeout: config.timeout ?? DEFAULT_CONFIG.timeout,
    streamIdleTimeout: config.streamIdleTimeout ?? DEFAULT_CONFIG.streamIdleTimeout,
    referer: config.referer ?? DEFAULT_CONFIG.referer,
    title: config.title ?? DEFAULT_CONFIG.title,
    defaultModel: config.defaultModel ?? DEFAULT_CONFIG.defaultModel,
    logLevel: config.logLevel ?? DEFAULT_CONFIG.logLevel,
  };
  validateConfig(normalized);
  return normalized;
}

/** Reads the `OPENROUTER_*` variables; unset or blank ones are left out. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const config: ClientConfig = {};
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const baseUrl = read('OPENROUTER_BASE_URL');
  if (baseUrl) config.baseUrl = baseUrl;

  const timeout = read('OPENROUTER_TIMEOUT_MS');
  if (timeout) config.timeout = Number(timeout);

  const streamIdleTimeout = read('OPENROUTER_STREAM_TIMEOUT_MS');
  if (streamIdleTimeout) config.streamIdleTimeout = Number(streamIdleTimeout);

  const referer = read('OPENROUTER_REFERER');
  if (referer) config.referer = referer;

  const title = read('OPENROUTER_TITLE');
  if (title) config.title = title;

  const defaultModel = read('OPENROUTER_DEFAULT_MODEL');
  if (defaultModel) config.defaultModel = defaultModel;

  const logLevel = read('OPENROUTER_LOG_LEVEL');
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new CallerError(
        `Invalid configuration: OPENROUTER_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`,
        { param: 'logLevel' }
      );
    }
    config.logLevel = logLevel;
  }

  return config;
}
