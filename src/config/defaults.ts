import type { Period } from '../models/Period.js';
import type { Platform } from '../models/Settings.js';

/**
 * Configuración por defecto para el CLI
 */
export const DEFAULT_CONFIG = {
  // Nombre de la app (carpeta de configuración)
  APP_NAME: 'last-shout',
  WINDOWS_APP_NAME: 'LastShout',

  // Archivo de settings
  SETTINGS_FILE: 'settings.ini',
  ERROR_LOG_FILE: 'http-errors.json',
  MAX_ERROR_LOG_ENTRIES: 100,

  // Valores por defecto de los argumentos
  NUMBER_OF_ARTISTS: 10,
  MIN_NUMBER_OF_ARTISTS: 1,
  MAX_NUMBER_OF_ARTISTS: 1000,
  PERIOD: '7day' satisfies Period,

  // Timeouts
  REQUEST_TIMEOUT: 10000,

  // Last.fm
  LASTFM_API_URL: 'https://ws.audioscrobbler.com/2.0/',

  // Mastodon (flujo OAuth "out of band": el usuario copia el código a mano)
  MASTODON_CLIENT_NAME: 'last-shout',
  MASTODON_WEBSITE: 'https://www.last.fm',
  MASTODON_REDIRECT_URI: 'urn:ietf:wg:oauth:2.0:oob',
  MASTODON_SCOPES: 'write:statuses read:accounts',

  // Bluesky
  BLUESKY_SERVICE: 'https://bsky.social'
} as const;

/**
 * Largo máximo de un post en cada plataforma
 */
export const PLATFORM_MAX_LENGTH: Record<Platform, number> = {
  mastodon: 500,
  bluesky: 300,
  twitter: 280
};

// Orden en el que se publica
export const PLATFORM_ORDER: readonly Platform[] = ['mastodon', 'bluesky', 'twitter'];

export const PLATFORM_NAMES: Record<Platform, string> = {
  mastodon: 'Mastodon',
  bluesky: 'Bluesky',
  twitter: 'Twitter'
};

export const EXIT_CODES = {
  SUCCESS: 0,
  UNEXPECTED_ERROR: 1,
  MISSING_CREDENTIALS: 2,
  POSTING_FAILED: 3,
  FETCH_FAILED: 4,
  INVALID_ARGUMENTS: 5,
  SETTINGS_FAILED: 6,
  CANCELLED: 130
} as const;

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES];

/**
 * Mensajes de ayuda y información
 */
export const HELP_MESSAGES = {
  WELCOME: '♪ last-shout',
  DESCRIPTION: 'Publicá tus artistas más escuchados de Last.fm en Mastodon, Bluesky y Twitter',

  LASTFM_MISSING: `
Para obtener una API key de Last.fm visitá: https://www.last.fm/api/account/create
Después guardala con:
  last-shout --user <usuario> --access-key <key> --set-lastfm
`,

  MASTODON_MISSING: `
Para configurar Mastodon:
  1. last-shout --create-mastodon-app --mastodon-url https://tu.instancia
  2. last-shout --create-mastodon-user
`,

  BLUESKY_MISSING: `
Usá una "app password" (Settings → Privacy and security → App passwords):
  last-shout --bluesky-handle <handle> --bluesky-password <app-password> --set-bluesky
`,

  TWITTER_MISSING: `
Creá una app en https://developer.x.com con permisos de escritura y guardá las claves:
  last-shout --twitter-consumer-key <k> --twitter-consumer-secret <s> \\
             --twitter-access-token <t> --twitter-access-secret <s> --set-twitter
`
} as const;
