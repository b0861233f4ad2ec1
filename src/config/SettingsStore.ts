import { promises as fs } from 'fs';
import path from 'path';
import { createEmptySettings, type Service, type Settings } from '../models/Settings.js';
import { ConfigPaths } from '../utils/ConfigPaths.js';
import { SettingsError } from '../utils/ErrorHandler.js';

export interface SettingsField {
  service: Service;
  section: string;
  key: string;
  read: (settings: Settings) => string;
  write: (settings: Settings, value: string) => void;
}

/**
 * Estructura del archivo INI: una sección por servicio
 */
export const SETTINGS_FIELDS: readonly SettingsField[] = [
  { service: 'lastfm', section: 'last_fm', key: 'user', read: s => s.lastfm.user, write: (s, v) => { s.lastfm.user = v; } },
  { service: 'lastfm', section: 'last_fm', key: 'access_key', read: s => s.lastfm.accessKey, write: (s, v) => { s.lastfm.accessKey = v; } },
  { service: 'mastodon', section: 'mastodon', key: 'client_id', read: s => s.mastodon.clientId, write: (s, v) => { s.mastodon.clientId = v; } },
  { service: 'mastodon', section: 'mastodon', key: 'client_secret', read: s => s.mastodon.clientSecret, write: (s, v) => { s.mastodon.clientSecret = v; } },
  { service: 'mastodon', section: 'mastodon', key: 'user_token', read: s => s.mastodon.userToken, write: (s, v) => { s.mastodon.userToken = v; } },
  { service: 'mastodon', section: 'mastodon', key: 'api_base_url', read: s => s.mastodon.apiBaseUrl, write: (s, v) => { s.mastodon.apiBaseUrl = v; } },
  { service: 'bluesky', section: 'bluesky', key: 'handle', read: s => s.bluesky.handle, write: (s, v) => { s.bluesky.handle = v; } },
  { service: 'bluesky', section: 'bluesky', key: 'password', read: s => s.bluesky.password, write: (s, v) => { s.bluesky.password = v; } },
  { service: 'twitter', section: 'twitter', key: 'consumer_key', read: s => s.twitter.consumerKey, write: (s, v) => { s.twitter.consumerKey = v; } },
  { service: 'twitter', section: 'twitter', key: 'consumer_secret', read: s => s.twitter.consumerSecret, write: (s, v) => { s.twitter.consumerSecret = v; } },
  { service: 'twitter', section: 'twitter', key: 'access_key', read: s => s.twitter.accessToken, write: (s, v) => { s.twitter.accessToken = v; } },
  { service: 'twitter', section: 'twitter', key: 'access_secret', read: s => s.twitter.accessSecret, write: (s, v) => { s.twitter.accessSecret = v; } }
];

const SECTION_REGEX = /^\[([^\]]+)\]$/;
const ENTRY_REGEX = /^([^=:\s][^=:]*?)\s*[=:]\s*(.*)$/;

/**
 * Persistencia de credenciales en un archivo INI dentro del directorio de configuración
 */
export class SettingsStore {
  readonly configDir: string;
  readonly settingsPath: string;

  constructor(configDir?: string) {
    this.configDir = configDir ? path.resolve(configDir) : ConfigPaths.getConfigDir();
    this.settingsPath = ConfigPaths.getSettingsPath(this.configDir);
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.settingsPath, fs.constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Lee el archivo de settings. Si no existe se crea con valores vacíos.
   */
  async load(): Promise<Settings> {
    let content: string;

    try {
      content = await fs.readFile(this.settingsPath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        const settings = createEmptySettings();
        await this.save(settings);
        return settings;
      }
      throw this.ioError('leer', error);
    }

    return this.parse(content);
  }

  /**
   * Escribe todas las credenciales al archivo (solo lectura/escritura para el dueño)
   */
  async save(settings: Settings): Promise<void> {
    const content = this.serialize(settings);

    try {
      await fs.mkdir(this.configDir, { recursive: true, mode: 0o700 });
      await fs.writeFile(this.settingsPath, content, { encoding: 'utf8', mode: 0o600 });
      await fs.chmod(this.settingsPath, 0o600);
    } catch (error) {
      throw this.ioError('escribir', error);
    }
  }

  parse(content: string): Settings {
    const settings = createEmptySettings();
    const lines = content.split(/\r?\n/);
    let section: string | null = null;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();

      if (line === '' || line.startsWith('#') || line.startsWith(';')) {
        continue;
      }

      const sectionMatch = line.match(SECTION_REGEX);
      if (sectionMatch) {
        section = sectionMatch[1].trim();
        continue;
      }

      const entryMatch = line.match(ENTRY_REGEX);
      if (!entryMatch) {
        throw new SettingsError(`Error de formato en ${this.settingsPath}, línea ${i + 1}: "${line}"`, 'parse');
      }
      if (section === null) {
        throw new SettingsError(`Error de formato en ${this.settingsPath}, línea ${i + 1}: clave fuera de una sección`, 'parse');
      }

      const key = entryMatch[1].trim().toLowerCase();
      const field = SETTINGS_FIELDS.find(f => f.section === section && f.key === key);
      // Claves desconocidas se ignoran
      field?.write(settings, entryMatch[2].trim());
    }

    return settings;
  }

  serialize(settings: Settings): string {
    const sections = new Map<string, string[]>();

    for (const field of SETTINGS_FIELDS) {
      const value = field.read(settings);
      if (/[\r\n]/.test(value)) {
        throw new SettingsError(`El valor de ${field.section}.${field.key} no puede contener saltos de línea`, 'parse');
      }
      // Al leer se recortan los espacios: no se guarda lo que no vuelve igual
      if (value !== value.trim()) {
        throw new SettingsError(`El valor de ${field.section}.${field.key} no puede empezar ni terminar con espacios`, 'parse');
      }

      const lines = sections.get(field.section) ?? [];
      lines.push(`${field.key} = ${value}`);
      sections.set(field.section, lines);
    }

    return Array.from(sections, ([name, lines]) => `[${name}]\n${lines.join('\n')}\n`).join('\n');
  }

  private ioError(action: 'leer' | 'escribir', error: unknown): SettingsError {
    const code = errorCode(error);
    if (code === 'EACCES' || code === 'EPERM') {
      return new SettingsError(`Sin permisos para ${action} ${this.settingsPath}`, 'io', error);
    }
    const message = error instanceof Error ? error.message : 'Error desconocido';
    return new SettingsError(`No se pudo ${action} ${this.settingsPath}: ${message}`, 'io', error);
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
