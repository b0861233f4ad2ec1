import { isAxiosError, type AxiosError } from 'axios';
import { ApiRequestError, ApiResponseError } from 'twitter-api-v2';
import { EXIT_CODES, PLATFORM_NAMES, type ExitCode } from '../config/defaults.js';
import type { Platform, Service } from '../models/Settings.js';

export class LastShoutError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: ExitCode,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'LastShoutError';
  }
}

export class CredentialsError extends LastShoutError {
  constructor(
    message: string,
    public readonly service: Service,
    public readonly missingFields: string[] = []
  ) {
    super(message, `MISSING_CREDENTIALS_${service.toUpperCase()}`, EXIT_CODES.MISSING_CREDENTIALS);
    this.name = 'CredentialsError';
  }
}

export type FetchErrorKind = 'auth' | 'user-not-found' | 'network' | 'service';

export class FetchError extends LastShoutError {
  constructor(message: string, public readonly kind: FetchErrorKind, originalError?: unknown) {
    super(message, `FETCH_${kind.toUpperCase().replace(/-/g, '_')}`, EXIT_CODES.FETCH_FAILED, originalError);
    this.name = 'FetchError';
  }
}

export type PostingErrorKind = 'auth' | 'validation' | 'network' | 'service';

export class PostingError extends LastShoutError {
  constructor(
    message: string,
    public readonly platform: Platform,
    public readonly kind: PostingErrorKind,
    originalError?: unknown
  ) {
    super(message, `POST_${kind.toUpperCase()}_${platform.toUpperCase()}`, EXIT_CODES.POSTING_FAILED, originalError);
    this.name = 'PostingError';
  }
}

export class ValidationError extends LastShoutError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENTS', EXIT_CODES.INVALID_ARGUMENTS);
    this.name = 'ValidationError';
  }
}

export type SettingsErrorKind = 'io' | 'parse';

export class SettingsError extends LastShoutError {
  constructor(message: string, public readonly kind: SettingsErrorKind, originalError?: unknown) {
    super(message, `SETTINGS_${kind.toUpperCase()}`, EXIT_CODES.SETTINGS_FAILED, originalError);
    this.name = 'SettingsError';
  }
}

/**
 * Falla de un flujo de configuración (registro de app, intercambio de token)
 */
export class SetupError extends LastShoutError {
  constructor(message: string, originalError?: unknown) {
    super(message, 'SETUP_FAILED', EXIT_CODES.UNEXPECTED_ERROR, originalError);
    this.name = 'SetupError';
  }
}

export class CancelledError extends LastShoutError {
  constructor(message: string = 'Operación cancelada por el usuario') {
    super(message, 'CANCELLED', EXIT_CODES.CANCELLED);
    this.name = 'CancelledError';
  }
}

// Códigos de error de la API de Last.fm
const LASTFM_AUTH_ERRORS = [4, 10, 26];
const LASTFM_USER_NOT_FOUND = 6;

// Twitter responde 403 también cuando rechaza el contenido del tweet
const REJECTED_CONTENT = /duplicate content|too long/i;

const NETWORK_ERROR_CODES = [
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNABORTED',
  'ENOTFOUND',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN'
];

export class ErrorHandler {
  /**
   * Clasificar un error de la consulta a Last.fm
   */
  classifyFetchError(error: unknown, user: string): FetchError {
    if (error instanceof FetchError) {
      return error;
    }

    if (isAxiosError(error)) {
      if (!error.response) {
        return new FetchError(`Error de red al consultar Last.fm: ${error.message}`, 'network', error);
      }

      const status = error.response.status;
      const lastfmCode = this.lastfmErrorCode(error.response.data);
      const detail = this.lastfmErrorMessage(error.response.data) || error.response.statusText;

      if (lastfmCode !== undefined) {
        return this.fromLastfmCode(lastfmCode, detail, user, error);
      }
      if (status === 401 || status === 403) {
        return new FetchError(`Last.fm rechazó la API key: ${detail}`, 'auth', error);
      }
      if (status === 404) {
        return new FetchError(`El usuario "${user}" no existe en Last.fm`, 'user-not-found', error);
      }
      return new FetchError(`Last.fm respondió con un error (${status}): ${detail}`, 'service', error);
    }

    if (error instanceof Error && this.isNetworkError(error)) {
      return new FetchError(`Error de red al consultar Last.fm: ${error.message}`, 'network', error);
    }

    const message = error instanceof Error ? error.message : 'Error desconocido';
    return new FetchError(`No se pudieron obtener los artistas: ${message}`, 'service', error);
  }

  /**
   * Traducir un código de error del cuerpo de respuesta de Last.fm
   */
  fromLastfmCode(code: number, detail: string, user: string, originalError?: unknown): FetchError {
    if (LASTFM_AUTH_ERRORS.includes(code)) {
      return new FetchError(`Last.fm rechazó la API key: ${detail}`, 'auth', originalError);
    }
    if (code === LASTFM_USER_NOT_FOUND) {
      return new FetchError(`El usuario "${user}" no existe en Last.fm`, 'user-not-found', originalError);
    }
    return new FetchError(`Last.fm respondió con el error ${code}: ${detail}`, 'service', originalError);
  }

  /**
   * Clasificar un error de una plataforma de publicación
   */
  classifyPostingError(error: unknown, platform: Platform): PostingError {
    if (error instanceof PostingError) {
      return error;
    }

    const name = PLATFORM_NAMES[platform];

    if (error instanceof ApiRequestError) {
      return new PostingError(`Error de red al publicar en ${name}: ${error.message}`, platform, 'network', error);
    }

    if (isAxiosError(error) && !error.response) {
      return new PostingError(`Error de red al publicar en ${name}: ${error.message}`, platform, 'network', error);
    }

    const status = this.statusOf(error);
    const detail = this.detailOf(error);

    if (status === undefined || status < 100) {
      if (error instanceof Error && (this.isNetworkError(error) || status !== undefined)) {
        return new PostingError(`Error de red al publicar en ${name}: ${detail}`, platform, 'network', error);
      }
      return new PostingError(`No se pudo publicar en ${name}: ${detail}`, platform, 'service', error);
    }

    if (status === 401 || (status === 403 && !REJECTED_CONTENT.test(detail))) {
      return new PostingError(`${name} rechazó las credenciales: ${detail}`, platform, 'auth', error);
    }
    if (status === 400 || status === 403 || status === 422) {
      return new PostingError(`${name} rechazó el post: ${detail}`, platform, 'validation', error);
    }
    return new PostingError(`${name} respondió con un error (${status}): ${detail}`, platform, 'service', error);
  }

  /**
   * Envolver cualquier error en la taxonomía propia
   */
  toLastShoutError(error: unknown): LastShoutError {
    if (error instanceof LastShoutError) {
      return error;
    }
    if (error instanceof Error) {
      return new LastShoutError(error.message, 'UNEXPECTED', EXIT_CODES.UNEXPECTED_ERROR, error);
    }
    return new LastShoutError('Ocurrió un error desconocido', 'UNEXPECTED', EXIT_CODES.UNEXPECTED_ERROR, error);
  }

  /**
   * Obtener el AxiosError original, si lo hay, para registrarlo
   */
  axiosErrorOf(error: LastShoutError): AxiosError | undefined {
    return isAxiosError(error.originalError) ? error.originalError : undefined;
  }

  /**
   * Obtener mensaje de error amigable para mostrar al usuario
   */
  friendlyMessage(error: LastShoutError): string {
    if (error instanceof FetchError) {
      switch (error.kind) {
        case 'auth':
          return `${error.message}. Verificá la API key guardada con --set-lastfm.`;
        case 'user-not-found':
          return `${error.message}. Revisá el nombre de usuario (--user).`;
        case 'network':
          return 'Error de conexión de red. Por favor verificá tu conexión a internet e intentá de nuevo.';
        default:
          return error.message;
      }
    }

    if (error instanceof PostingError && error.kind === 'network') {
      return `${error.message}. Verificá tu conexión a internet e intentá de nuevo.`;
    }

    if (error instanceof CredentialsError && error.missingFields.length > 0) {
      return `${error.message} (faltan: ${error.missingFields.join(', ')})`;
    }

    return error.message;
  }

  /**
   * Verificar si el error está relacionado con la red
   */
  isNetworkError(error: Error): boolean {
    const code = 'code' in error ? error.code : undefined;
    const causeCode = error.cause instanceof Error && 'code' in error.cause ? error.cause.code : undefined;

    return NETWORK_ERROR_CODES.some(candidate =>
      error.message.includes(candidate) ||
      code === candidate ||
      causeCode === candidate
    );
  }

  private statusOf(error: unknown): number | undefined {
    if (error instanceof ApiResponseError) {
      return error.code;
    }
    if (isAxiosError(error)) {
      return error.response?.status;
    }
    // XRPCError de @atproto expone el status HTTP
    if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
      return error.status;
    }
    return undefined;
  }

  private detailOf(error: unknown): string {
    if (error instanceof ApiResponseError) {
      const data: unknown = error.data;
      return stringField(data, 'detail') ?? stringField(data, 'title') ?? error.message;
    }
    if (isAxiosError(error)) {
      return stringField(error.response?.data, 'error') ?? (error.response?.statusText || error.message);
    }
    return error instanceof Error ? error.message : 'Error desconocido';
  }

  private lastfmErrorCode(data: unknown): number | undefined {
    if (typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'number') {
      return data.error;
    }
    return undefined;
  }

  private lastfmErrorMessage(data: unknown): string {
    return stringField(data, 'message') ?? '';
  }
}

function stringField(data: unknown, key: string): string | undefined {
  if (typeof data !== 'object' || data === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(data, key);
  return typeof value === 'string' ? value : undefined;
}
