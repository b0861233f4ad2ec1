import { TwitterApi, type TwitterApiReadWrite } from 'twitter-api-v2';
import twitterText from 'twitter-text';
import { PLATFORM_MAX_LENGTH } from '../../config/defaults.js';
import type { PostConfirmation } from '../../models/Post.js';
import type { TwitterCredentials } from '../../models/Settings.js';
import { ErrorHandler } from '../../utils/ErrorHandler.js';
import type { Publisher } from './Publisher.js';

/**
 * Publica tweets con OAuth 1.0a (claves de usuario de la app)
 */
export class TwitterPublisher implements Publisher {
  readonly platform = 'twitter' as const;
  readonly maxLength = PLATFORM_MAX_LENGTH.twitter;

  private client: TwitterApiReadWrite | null = null;
  private errorHandler = new ErrorHandler();

  constructor(private credentials: TwitterCredentials) {}

  /**
   * Largo ponderado de Twitter: CJK, símbolos y emoji cuentan doble, los links 23
   */
  measure(text: string): number {
    return twitterText.parseTweet(text).weightedLength;
  }

  async authenticate(): Promise<void> {
    this.client = new TwitterApi({
      appKey: this.credentials.consumerKey,
      appSecret: this.credentials.consumerSecret,
      accessToken: this.credentials.accessToken,
      accessSecret: this.credentials.accessSecret
    }).readWrite;
  }

  async publish(text: string): Promise<PostConfirmation> {
    if (!this.client) {
      await this.authenticate();
    }

    try {
      const tweet = await this.requireClient().v2.tweet(text);
      return {
        platform: this.platform,
        id: tweet.data.id,
        url: `https://x.com/i/web/status/${tweet.data.id}`
      };
    } catch (error) {
      throw this.errorHandler.classifyPostingError(error, this.platform);
    }
  }

  private requireClient(): TwitterApiReadWrite {
    if (!this.client) {
      throw new Error('El cliente de Twitter no está inicializado');
    }
    return this.client;
  }
}
