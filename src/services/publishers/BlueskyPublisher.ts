import { AtpAgent, RichText } from '@atproto/api';
import { DEFAULT_CONFIG, PLATFORM_MAX_LENGTH } from '../../config/defaults.js';
import type { PostConfirmation } from '../../models/Post.js';
import type { BlueskyCredentials } from '../../models/Settings.js';
import { ErrorHandler } from '../../utils/ErrorHandler.js';
import { textLength } from '../../utils/SummaryText.js';
import type { Publisher } from './Publisher.js';

/**
 * Publica "skeets" con el cliente oficial de AT Protocol
 */
export class BlueskyPublisher implements Publisher {
  readonly platform = 'bluesky' as const;
  readonly maxLength = PLATFORM_MAX_LENGTH.bluesky;
  readonly measure = textLength;

  private agent: AtpAgent;
  private errorHandler = new ErrorHandler();
  private authenticated = false;

  constructor(private credentials: BlueskyCredentials, service: string = DEFAULT_CONFIG.BLUESKY_SERVICE) {
    this.agent = new AtpAgent({ service });
  }

  async authenticate(): Promise<void> {
    try {
      await this.agent.login({
        identifier: this.credentials.handle,
        password: this.credentials.password
      });
      this.authenticated = true;
    } catch (error) {
      throw this.errorHandler.classifyPostingError(error, this.platform);
    }
  }

  async publish(text: string): Promise<PostConfirmation> {
    if (!this.authenticated) {
      await this.authenticate();
    }

    try {
      // Detecta links, menciones y hashtags
      const richText = new RichText({ text });
      await richText.detectFacets(this.agent);

      const result = await this.agent.post({
        text: richText.text,
        facets: richText.facets,
        createdAt: new Date().toISOString()
      });

      return {
        platform: this.platform,
        id: result.uri,
        url: this.buildPostUrl(result.uri)
      };
    } catch (error) {
      throw this.errorHandler.classifyPostingError(error, this.platform);
    }
  }

  /**
   * at://did:plc:xxx/app.bsky.feed.post/<rkey> → https://bsky.app/profile/<handle>/post/<rkey>
   */
  private buildPostUrl(uri: string): string | undefined {
    const rkey = uri.split('/').pop();
    if (!rkey) {
      return undefined;
    }
    return `https://bsky.app/profile/${this.credentials.handle}/post/${rkey}`;
  }
}
