import axios, { type AxiosInstance } from 'axios';
import { DEFAULT_CONFIG, PLATFORM_MAX_LENGTH } from '../../config/defaults.js';
import type { MastodonAccount, MastodonStatus } from '../../models/MastodonTypes.js';
import type { PostConfirmation } from '../../models/Post.js';
import type { MastodonCredentials } from '../../models/Settings.js';
import { ErrorHandler } from '../../utils/ErrorHandler.js';
import { textLength } from '../../utils/SummaryText.js';
import type { Publisher } from './Publisher.js';

/**
 * Publica "toots" usando la API REST de la instancia
 */
export class MastodonPublisher implements Publisher {
  readonly platform = 'mastodon' as const;
  readonly maxLength = PLATFORM_MAX_LENGTH.mastodon;
  readonly measure = textLength;

  private client: Pick<AxiosInstance, 'get' | 'post'>;
  private errorHandler = new ErrorHandler();

  constructor(credentials: MastodonCredentials, client?: Pick<AxiosInstance, 'get' | 'post'>) {
    this.client = client ?? axios.create({
      baseURL: credentials.apiBaseUrl,
      headers: {
        'Authorization': `Bearer ${credentials.userToken}`,
        'Content-Type': 'application/json'
      },
      timeout: DEFAULT_CONFIG.REQUEST_TIMEOUT
    });
  }

  /**
   * Verificar que el token de usuario sigue siendo válido
   */
  async authenticate(): Promise<void> {
    try {
      await this.client.get<MastodonAccount>('/api/v1/accounts/verify_credentials');
    } catch (error) {
      throw this.errorHandler.classifyPostingError(error, this.platform);
    }
  }

  async publish(text: string): Promise<PostConfirmation> {
    try {
      const response = await this.client.post<MastodonStatus>('/api/v1/statuses', {
        status: text,
        visibility: 'public'
      });

      return {
        platform: this.platform,
        id: response.data.id,
        url: response.data.url ?? response.data.uri
      };
    } catch (error) {
      throw this.errorHandler.classifyPostingError(error, this.platform);
    }
  }
}
