import type { Platform, Settings } from '../../models/Settings.js';
import { BlueskyPublisher } from './BlueskyPublisher.js';
import { MastodonPublisher } from './MastodonPublisher.js';
import type { Publisher } from './Publisher.js';
import { TwitterPublisher } from './TwitterPublisher.js';

export type { Publisher } from './Publisher.js';
export { BlueskyPublisher } from './BlueskyPublisher.js';
export { MastodonPublisher } from './MastodonPublisher.js';
export { TwitterPublisher } from './TwitterPublisher.js';

export function createPublisher(platform: Platform, settings: Settings): Publisher {
  switch (platform) {
    case 'mastodon':
      return new MastodonPublisher(settings.mastodon);
    case 'bluesky':
      return new BlueskyPublisher(settings.bluesky);
    case 'twitter':
      return new TwitterPublisher(settings.twitter);
  }
}
