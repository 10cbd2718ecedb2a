import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { ModelSettings, SettingsStore, settingsPath, DEFAULT_MODEL } from '../index.js';
import { CallerError } from '../../errors/categories.js';

describe('settingsPath', () => {
  it('prefers XDG_CONFIG_HOME', () => {
    expect(settingsPath('linux', { XDG_CONFIG_HOME: '/cfg' }, '/home/u')).toBe(
      join('/cfg', 'openrouter-prompt', 'settings.json')
    );
  });

  it('falls back to ~/.config', () => {
    expect(settingsPath('darwin', {}, '/home/u')).toBe(join('/home/u', '.config', 'openrouter-prompt', 'settings.json'));
  });

  it('uses APPDATA on Windows', () => {
    expect(settingsPath('win32', { APPDATA: '/appdata' }, '/home/u')).toBe(
      join('/appdata', 'openrouter-prompt', 'settings.json')
    );
  });
});

describe('SettingsStore', () => {
  let dir: string;
  let store: SettingsStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'openrouter-settings-'));
    store = new SettingsStore(join(dir, 'nested', 'settings.json'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeRaw(text: string): Promise<void> {
    await mkdir(dirname(store.path), { recursive: true });
    await writeFile(store.path, text, 'utf8');
  }

  it('reads a missing file as empty settings', async () => {
    expect(await store.load()).toEqual({});
  });

  it('saves and reloads', async () => {
    await store.save({ defaultModel: 'anthropic/claude-3-haiku' });

    expect(await store.load()).toEqual({ defaultModel: 'anthropic/claude-3-haiku' });
    expect(await readFile(store.path, 'utf8')).toBe('{\n  "defaultModel": "anthropic/claude-3-haiku"\n}\n');
  });

  it('keeps unknown keys on update', async () => {
    await writeRaw('{"theme":"dark"}');

    await store.update({ defaultModel: 'x/y' });

    expect(await store.load()).toEqual({ theme: 'dark', defaultModel: 'x/y' });
  });

  it('rejects a file that is not JSON', async () => {
    await writeRaw('{oops');

    await expect(store.load()).rejects.toThrow(`Settings file ${store.path} is not valid JSON`);
  });

  it('rejects a blank default model', async () => {
    await writeRaw('{"defaultModel":"  "}');

    await expect(store.load()).rejects.toBeInstanceOf(CallerError);
  });
});

describe('ModelSettings', () => {
  let dir: string;
  let store: SettingsStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'openrouter-model-'));
    store = new SettingsStore(join(dir, 'settings.json'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts at the built-in default', () => {
    expect(new ModelSettings().get()).toBe(DEFAULT_MODEL);
  });

  it('changes are visible immediately', async () => {
    const settings = new ModelSettings();
    await settings.set('  mistralai/mistral-7b  ');

    expect(settings.get()).toBe('mistralai/mistral-7b');
  });

  it('rejects an empty model', async () => {
    await expect(new ModelSettings().set(' ')).rejects.toThrow('Default model cannot be empty');
  });

  it('persists through a bound store', async () => {
    await new ModelSettings(DEFAULT_MODEL, store).set('google/gemini-flash');

    expect((await ModelSettings.load(store)).get()).toBe('google/gemini-flash');
  });

  it('lets an override win over the stored value', async () => {
    await store.save({ defaultModel: 'stored/model' });

    expect((await ModelSettings.load(store, 'env/model')).get()).toBe('env/model');
    expect((await ModelSettings.load(store, '')).get()).toBe('stored/model');
  });

  it('uses the built-in default when nothing is stored', async () => {
    expect((await ModelSettings.load(store)).get()).toBe(DEFAULT_MODEL);
  });
});
