import type { CompletionClient } from './types.js';
import type { ClientConfig } from './config.js';
import { configFromEnv } from './config.js';
import { CompletionClientImpl, type ClientDependencies } from './client-impl.js';
import { ModelSettings } from '../settings/model-settings.js';
import { SettingsStore, settingsPath } from '../settings/settings-store.js';

export interface EnvClientDependencies extends ClientDependencies {
  settingsStore?: SettingsStore;
}

export function createClient(config: ClientConfig = {}, deps: ClientDependencies = {}): CompletionClient {
  return new CompletionClientImpl(config, deps);
}

/**
 * Builds a client from `OPENROUTER_*` variables, with the default model
 * loaded from the user's settings file unless the environment names one.
 */
export async function createClientFromEnv(
  deps: EnvClientDependencies = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<CompletionClient> {
  const config = configFromEnv(env);
  const { settingsStore, ...clientDeps } = deps;
  const store = settingsStore ?? new SettingsStore(settingsPath(process.platform, env));
  const modelSettings = clientDeps.modelSettings ?? (await ModelSettings.load(store, config.defaultModel));
  return createClient(config, { ...clientDeps, modelSettings });
}
