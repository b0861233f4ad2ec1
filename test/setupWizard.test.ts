import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MastodonAuthManager } from '../src/auth/MastodonAuthManager.js';
import type { Prompter } from '../src/cli/Prompter.js';
import { SetupWizard } from '../src/cli/SetupWizard.js';
import { createEmptySettings } from '../src/models/Settings.js';
import { SetupError } from '../src/utils/ErrorHandler.js';
import { filledSettings } from './helpers.js';

function makeWizard(answer: string) {
  const prompter: Prompter = { input: vi.fn().mockResolvedValue(answer) };
  const post = vi.fn().mockImplementation(async (url: string) => {
    if (url.endsWith('/api/v1/apps')) {
      return { data: { name: 'last-shout', client_id: 'new-client-id', client_secret: 'new-client-secret' } };
    }
    return { data: { access_token: 'new-user-token' } };
  });
  const authManager = new MastodonAuthManager({ post });
  const openBrowser = vi.spyOn(authManager, 'openBrowser').mockResolvedValue(false);

  return { wizard: new SetupWizard(prompter, authManager), prompter, post, openBrowser };
}

describe('SetupWizard', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('createMastodonApp', () => {
    it('registers on the given instance without prompting', async () => {
      const { wizard, prompter, post } = makeWizard('unused');

      const settings = await wizard.createMastodonApp(createEmptySettings(), 'mastodon.example/');

      expect(settings.mastodon).toEqual({
        apiBaseUrl: 'https://mastodon.example',
        clientId: 'new-client-id',
        clientSecret: 'new-client-secret',
        userToken: ''
      });
      expect(prompter.input).not.toHaveBeenCalled();
      expect(post.mock.calls[0][0]).toBe('https://mastodon.example/api/v1/apps');
    });

    it('asks for the instance when none is known', async () => {
      const { wizard, prompter } = makeWizard('https://prompted.example/');

      const settings = await wizard.createMastodonApp(createEmptySettings());

      expect(prompter.input).toHaveBeenCalledWith('URL de tu instancia de Mastodon:', { default: 'https://mastodon.social' });
      expect(settings.mastodon.apiBaseUrl).toBe('https://prompted.example');
    });

    it('keeps the user token when re-registering on the same instance', async () => {
      const { wizard } = makeWizard('unused');

      const settings = await wizard.createMastodonApp(filledSettings());

      expect(settings.mastodon.userToken).toBe('test-user-token');
      expect(settings.mastodon.clientId).toBe('new-client-id');
      expect(settings.lastfm).toEqual(filledSettings().lastfm);
    });

    it('drops the user token when switching instances', async () => {
      const { wizard } = makeWizard('unused');

      const settings = await wizard.createMastodonApp(filledSettings(), 'https://other.example');

      expect(settings.mastodon.userToken).toBe('');
    });

    it('turns an invalid URL into a setup error', async () => {
      const { wizard, post } = makeWizard('unused');

      await expect(wizard.createMastodonApp(createEmptySettings(), 'ftp://nope')).rejects.toBeInstanceOf(SetupError);
      expect(post).not.toHaveBeenCalled();
    });
  });

  describe('createMastodonUserToken', () => {
    it('requires the app to be registered first', async () => {
      const { wizard, prompter } = makeWizard('test-code');

      await expect(wizard.createMastodonUserToken(createEmptySettings()))
        .rejects.toThrow('Faltan las credenciales de la app de Mastodon. Ejecutá primero --create-mastodon-app');
      expect(prompter.input).not.toHaveBeenCalled();
    });

    it('exchanges the pasted code for a token', async () => {
      const { wizard, openBrowser, post } = makeWizard('test-code');
      const start = filledSettings();
      start.mastodon.userToken = '';

      const settings = await wizard.createMastodonUserToken(start);

      expect(settings.mastodon).toEqual({ ...start.mastodon, userToken: 'new-user-token' });
      expect(openBrowser).toHaveBeenCalledWith(expect.stringMatching(/^https:\/\/mastodon\.example\/oauth\/authorize\?client_id=test-client-id&/));
      expect(post.mock.calls[0][0]).toBe('https://mastodon.example/oauth/token');
    });

    it('fails when no code is entered', async () => {
      const { wizard, post } = makeWizard('');

      await expect(wizard.createMastodonUserToken(filledSettings()))
        .rejects.toThrow('No se ingresó ningún código de autorización');
      expect(post).not.toHaveBeenCalled();
    });
  });
});
