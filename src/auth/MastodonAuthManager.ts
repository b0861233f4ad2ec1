import axios, { type AxiosInstance } from 'axios';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { MastodonApplication, MastodonToken } from '../models/MastodonTypes.js';
import type { MastodonCredentials } from '../models/Settings.js';
import { SetupError, ValidationError } from '../utils/ErrorHandler.js';

const execFileAsync = promisify(execFile);

export interface MastodonAppCredentials {
  clientId: string;
  clientSecret: string;
}

/**
 * Registro de la app y obtención del token de usuario de Mastodon.
 * Usa el flujo OAuth "out of band": el usuario pega el código a mano.
 */
export class MastodonAuthManager {
  private client: Pick<AxiosInstance, 'post'>;

  constructor(client?: Pick<AxiosInstance, 'post'>) {
    this.client = client ?? axios.create({ timeout: DEFAULT_CONFIG.REQUEST_TIMEOUT });
  }

  /**
   * "mastodon.social/" → "https://mastodon.social"
   */
  static normalizeInstanceUrl(input: string): string {
    const trimmed = input.trim();
    if (!trimmed) {
      throw new ValidationError('La URL de la instancia de Mastodon está vacía');
    }

    const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

    let parsed: URL;
    try {
      parsed = new URL(withScheme);
    } catch {
      throw new ValidationError(`URL de instancia inválida: "${input}"`);
    }

    if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
      throw new ValidationError(`URL de instancia inválida: "${input}"`);
    }

    return `${parsed.origin}${parsed.pathname}`.replace(/\/+$/, '');
  }

  /**
   * Registrar la aplicación en la instancia
   */
  async registerApp(apiBaseUrl: string): Promise<MastodonAppCredentials> {
    try {
      const response = await this.client.post<MastodonApplication>(
        `${apiBaseUrl}/api/v1/apps`,
        new URLSearchParams({
          client_name: DEFAULT_CONFIG.MASTODON_CLIENT_NAME,
          redirect_uris: DEFAULT_CONFIG.MASTODON_REDIRECT_URI,
          scopes: DEFAULT_CONFIG.MASTODON_SCOPES,
          website: DEFAULT_CONFIG.MASTODON_WEBSITE
        }).toString(),
        {
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' }
        }
      );

      const { client_id, client_secret } = response.data;
      if (!client_id || !client_secret) {
        throw new Error('La instancia no devolvió client_id/client_secret');
      }

      return { clientId: client_id, clientSecret: client_secret };
    } catch (error) {
      throw new SetupError(
        `No se pudo registrar la app en ${apiBaseUrl}: ${error instanceof Error ? error.message : 'Error desconocido'}`,
        error
      );
    }
  }

  /**
   * Construir URL de autorización para el usuario
   */
  buildAuthorizationUrl(apiBaseUrl: string, clientId: string): string {
    const params = new URLSearchParams({
      client_id: clientId,
      response_type: 'code',
      redirect_uri: DEFAULT_CONFIG.MASTODON_REDIRECT_URI,
      scope: DEFAULT_CONFIG.MASTODON_SCOPES
    });

    return `${apiBaseUrl}/oauth/authorize?${params.toString()}`;
  }

  /**
   * Intercambiar código de autorización por token de acceso
   */
  async exchangeCodeForToken(credentials: MastodonCredentials, code: string): Promise<string> {
    try {
      const response = await this.client.post<MastodonToken>(
        `${credentials.apiBaseUrl}/oauth/token`,
        new URLSearchParams({
          grant_type: 'authorization_code',
          code: code.trim(),
          client_id: credentials.clientId,
          client_secret: credentials.clientSecret,
          redirect_uri: DEFAULT_CONFIG.MASTODON_REDIRECT_URI,
          scope: DEFAULT_CONFIG.MASTODON_SCOPES
        }).toString(),
        {
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' }
        }
      );

      const { access_token } = response.data;
      if (!access_token) {
        throw new Error('La instancia no devolvió access_token');
      }

      return access_token;
    } catch (error) {
      throw new SetupError(
        `No se pudo obtener el token de usuario: ${error instanceof Error ? error.message : 'Error desconocido'}`,
        error
      );
    }
  }

  /**
   * Abrir navegador en la URL de autorización. Devuelve false si no se pudo.
   */
  async openBrowser(url: string): Promise<boolean> {
    try {
      switch (process.platform) {
        case 'darwin': // macOS
          await execFileAsync('open', [url]);
          break;
        case 'win32': // Windows
          await execFileAsync('rundll32', ['url.dll,FileProtocolHandler', url]);
          break;
        default: // Linux y otros
          await execFileAsync('xdg-open', [url]);
          break;
      }
      return true;
    } catch {
      return false;
    }
  }
}
