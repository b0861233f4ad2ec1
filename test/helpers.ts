import { AxiosError, AxiosHeaders, type InternalAxiosRequestConfig } from 'axios';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Settings } from '../src/models/Settings.js';
import type { TopArtistEntry } from '../src/models/TopArtist.js';

export const ARTISTS: TopArtistEntry[] = [
  { name: 'Artist A', playCount: 50 },
  { name: 'Artist B', playCount: 30 },
  { name: 'Artist C', playCount: 10 }
];

export function filledSettings(): Settings {
  return {
    lastfm: { user: 'test-user', accessKey: 'test-lastfm-key' },
    mastodon: {
      clientId: 'test-client-id',
      clientSecret: 'test-client-secret',
      userToken: 'test-user-token',
      apiBaseUrl: 'https://mastodon.example'
    },
    bluesky: { handle: 'test.bsky.social', password: 'test-password' },
    twitter: {
      consumerKey: 'test-consumer-key',
      consumerSecret: 'test-consumer-secret',
      accessToken: 'test-access-token',
      accessSecret: 'test-access-secret'
    }
  };
}

export function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'last-shout-'));
}

/**
 * AxiosError con respuesta (status) o sin ella (null = error de red)
 */
export function axiosError(
  status: number | null,
  data?: unknown,
  config: Partial<InternalAxiosRequestConfig> = {}
): AxiosError {
  const requestConfig: InternalAxiosRequestConfig = { headers: new AxiosHeaders(), ...config };

  if (status === null) {
    return new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED', requestConfig, {});
  }

  return new AxiosError(
    `Request failed with status code ${status}`,
    status >= 500 ? 'ERR_BAD_RESPONSE' : 'ERR_BAD_REQUEST',
    requestConfig,
    {},
    { status, statusText: 'Error', headers: {}, config: requestConfig, data }
  );
}
