export interface LastfmCredentials {
  user: string;
  accessKey: string;
}

export interface MastodonCredentials {
  clientId: string;
  clientSecret: string;
  userToken: string;
  apiBaseUrl: string;
}

export interface BlueskyCredentials {
  handle: string;
  password: string;
}

export interface TwitterCredentials {
  consumerKey: string;
  consumerSecret: string;
  accessToken: string;
  accessSecret: string;
}

export interface Settings {
  lastfm: LastfmCredentials;
  mastodon: MastodonCredentials;
  bluesky: BlueskyCredentials;
  twitter: TwitterCredentials;
}

export type Platform = 'mastodon' | 'bluesky' | 'twitter';

// Last.fm más las plataformas donde se publica
export type Service = 'lastfm' | Platform;

export function createEmptySettings(): Settings {
  return {
    lastfm: { user: '', accessKey: '' },
    mastodon: { clientId: '', clientSecret: '', userToken: '', apiBaseUrl: '' },
    bluesky: { handle: '', password: '' },
    twitter: { consumerKey: '', consumerSecret: '', accessToken: '', accessSecret: '' }
  };
}
