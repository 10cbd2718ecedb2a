import { CallerError } from '../errors/categories.js';
import type { SettingsStore } from './settings-store.js';

export const DEFAULT_MODEL = 'openai/gpt-4o-mini';

/**
 * The model used when a call names none. Read at call time, so a change is
 * seen by the next call. Bound to a {@link SettingsStore}, `set` also persists.
 */
export class ModelSettings {
  constructor(
    private current: string = DEFAULT_MODEL,
    private readonly store?: SettingsStore
  ) {}

  get(): string {
    return this.current;
  }

  async set(model: string): Promise<void> {
    const trimmed = model.trim();
    if (!trimmed) {
      throw new CallerError('Default model cannot be empty', { param: 'model' });
    }
    this.current = trimmed;
    await this.store?.update({ defaultModel: trimmed });
  }

  /**
   * An explicit `override` wins, then the persisted value, then
   * {@link DEFAULT_MODEL}.
   */
  static async load(store: SettingsStore, override?: string): Promise<ModelSettings> {
    if (override?.trim()) {
      return new ModelSettings(override.trim(), store);
    }
    const settings = await store.load();
    return new ModelSettings(settings.defaultModel ?? DEFAULT_MODEL, store);
  }
}
