import axios, { type AxiosInstance } from 'axios';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { Period } from '../models/Period.js';
import type { LastfmArtist, LastfmTopArtistsResponse, TopArtistEntry } from '../models/TopArtist.js';
import { ErrorHandler } from '../utils/ErrorHandler.js';

/**
 * Fuente de los artistas más escuchados
 */
export interface TopArtistsProvider {
  getTopArtists(apiKey: string, user: string, limit: number, period: Period): Promise<TopArtistEntry[]>;
}

/**
 * Servicio para consultar la API REST de Last.fm
 */
export class LastfmService implements TopArtistsProvider {
  private client: Pick<AxiosInstance, 'get'>;
  private errorHandler = new ErrorHandler();

  constructor(client?: Pick<AxiosInstance, 'get'>) {
    this.client = client ?? axios.create({
      baseURL: DEFAULT_CONFIG.LASTFM_API_URL,
      headers: {
        'Accept': 'application/json',
        'User-Agent': `${DEFAULT_CONFIG.APP_NAME} (+https://www.last.fm/api)`
      },
      timeout: DEFAULT_CONFIG.REQUEST_TIMEOUT
    });
  }

  /**
   * Obtener los artistas más escuchados del usuario en el período.
   * Puede devolver menos de `limit` si el usuario escuchó poco.
   */
  async getTopArtists(apiKey: string, user: string, limit: number, period: Period): Promise<TopArtistEntry[]> {
    let data: LastfmTopArtistsResponse;

    try {
      const response = await this.client.get<LastfmTopArtistsResponse>('', {
        params: {
          method: 'user.gettopartists',
          user,
          api_key: apiKey,
          period,
          limit,
          format: 'json'
        }
      });
      data = response.data;
    } catch (error) {
      throw this.errorHandler.classifyFetchError(error, user);
    }

    // Last.fm a veces responde 200 con un error en el cuerpo
    if (typeof data.error === 'number') {
      throw this.errorHandler.fromLastfmCode(data.error, data.message ?? '', user);
    }

    return this.convertArtists(data.topartists?.artist).slice(0, limit);
  }

  /**
   * Convertir artistas de Last.fm al formato interno
   */
  private convertArtists(artists: LastfmArtist[] | LastfmArtist | undefined): TopArtistEntry[] {
    if (!artists) {
      return [];
    }

    const list = Array.isArray(artists) ? artists : [artists];
    return list.map(artist => ({
      name: artist.name,
      playCount: Number.parseInt(artist.playcount, 10) || 0
    }));
  }
}
