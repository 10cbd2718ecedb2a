export type { Settings } from './settings-store.js';
export { SettingsStore, settingsPath, SETTINGS_DIR_NAME, SETTINGS_FILE_NAME } from './settings-store.js';
export { ModelSettings, DEFAULT_MODEL } from './model-settings.js';
