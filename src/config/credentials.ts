import type { Service, Settings } from '../models/Settings.js';
import { SETTINGS_FIELDS } from './SettingsStore.js';

const isBlank = (value: string): boolean => value.trim() === '';

/**
 * Campos requeridos vacíos de un servicio, como "sección.clave"
 */
export function missingCredentials(settings: Settings, service: Service): string[] {
  return SETTINGS_FIELDS
    .filter(field => field.service === service && isBlank(field.read(settings)))
    .map(field => `${field.section}.${field.key}`);
}

/**
 * true solo si todos los campos requeridos del servicio tienen valor
 */
export function hasCredentials(settings: Settings, service: Service): boolean {
  return missingCredentials(settings, service).length === 0;
}

export function hasMastodonAppCredentials(settings: Settings): boolean {
  const { clientId, clientSecret, apiBaseUrl } = settings.mastodon;
  return !isBlank(clientId) && !isBlank(clientSecret) && !isBlank(apiBaseUrl);
}

export function hasMastodonUserCredentials(settings: Settings): boolean {
  return !isBlank(settings.mastodon.userToken);
}
