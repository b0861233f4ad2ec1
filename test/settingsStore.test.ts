import fs from 'fs/promises';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { SettingsStore } from '../src/config/SettingsStore.js';
import { createEmptySettings } from '../src/models/Settings.js';
import { SettingsError } from '../src/utils/ErrorHandler.js';
import { filledSettings, makeTempDir } from './helpers.js';

describe('SettingsStore', () => {
  it('creates the file with empty values when it does not exist', async () => {
    const dir = await makeTempDir();
    try {
      const store = new SettingsStore(path.join(dir, 'nested', 'config'));

      expect(await store.exists()).toBe(false);
      const settings = await store.load();

      expect(settings).toEqual(createEmptySettings());
      expect(await store.exists()).toBe(true);
      expect(await fs.readFile(store.settingsPath, 'utf8')).toBe(store.serialize(createEmptySettings()));
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('round-trips every field, including empty ones', async () => {
    const dir = await makeTempDir();
    try {
      const store = new SettingsStore(dir);
      const settings = filledSettings();
      settings.twitter.accessSecret = '';
      settings.mastodon.userToken = '';

      await store.save(settings);

      expect(await new SettingsStore(dir).load()).toEqual(settings);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('keeps inner spaces and refuses values that would lose outer ones', async () => {
    const dir = await makeTempDir();
    try {
      const store = new SettingsStore(dir);
      const settings = filledSettings();
      settings.bluesky.password = 'pass word';

      await store.save(settings);
      expect((await store.load()).bluesky.password).toBe('pass word');

      settings.bluesky.password = ' pass word ';
      await expect(store.save(settings)).rejects.toMatchObject({
        name: 'SettingsError',
        kind: 'parse',
        message: 'El valor de bluesky.password no puede empezar ni terminar con espacios'
      });
      expect((await store.load()).bluesky.password).toBe('pass word');
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it.skipIf(process.platform === 'win32')('writes the file readable only by its owner', async () => {
    const dir = await makeTempDir();
    try {
      const store = new SettingsStore(dir);
      await store.save(filledSettings());

      const stat = await fs.stat(store.settingsPath);
      expect(stat.mode & 0o777).toBe(0o600);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('writes one section per service', () => {
    const store = new SettingsStore('/tmp/last-shout-unused');
    const content = store.serialize(filledSettings());

    expect(content).toContain('[last_fm]\nuser = test-user\naccess_key = test-lastfm-key\n');
    expect(content).toContain('[bluesky]\nhandle = test.bsky.social\npassword = test-password\n');
    expect(content).toContain('[twitter]\nconsumer_key = test-consumer-key\n');
  });

  it('stores the settings file inside the config dir', () => {
    const store = new SettingsStore('/tmp/last-shout-unused');
    expect(store.settingsPath).toBe(path.join(path.resolve('/tmp/last-shout-unused'), 'settings.ini'));
  });

  it('fills missing keys with empty strings and ignores unknown ones', () => {
    const store = new SettingsStore('/tmp/last-shout-unused');
    const settings = store.parse([
      '# comentario',
      '[last_fm]',
      'User = alice  ',
      'favourite_colour = blue',
      '',
      '[unknown]',
      'foo = bar',
      '[bluesky]',
      'password: test-password'
    ].join('\r\n'));

    expect(settings.lastfm).toEqual({ user: 'alice', accessKey: '' });
    expect(settings.bluesky).toEqual({ handle: '', password: 'test-password' });
    expect(settings.mastodon.apiBaseUrl).toBe('');
  });

  it('rejects a malformed line', () => {
    const store = new SettingsStore('/tmp/last-shout-unused');

    expect(() => store.parse('[last_fm]\nnot an entry')).toThrow(SettingsError);
    expect(() => store.parse('[last_fm]\nnot an entry')).toThrow('línea 2');
  });

  it('rejects a key outside of any section', () => {
    const store = new SettingsStore('/tmp/last-shout-unused');

    try {
      store.parse('user = alice');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SettingsError);
      expect(error).toMatchObject({ kind: 'parse', exitCode: 6 });
    }
  });

  it('refuses to save a value with a line break', async () => {
    const dir = await makeTempDir();
    try {
      const store = new SettingsStore(dir);
      const settings = filledSettings();
      settings.bluesky.password = 'line\nbreak';

      await expect(store.save(settings)).rejects.toMatchObject({ kind: 'parse' });
      expect(await store.exists()).toBe(false);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('reports a read failure as an io error', async () => {
    const dir = await makeTempDir();
    try {
      const store = new SettingsStore(dir);
      await fs.mkdir(store.settingsPath);

      await expect(store.load()).rejects.toMatchObject({ name: 'SettingsError', kind: 'io' });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
