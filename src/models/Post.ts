import type { Platform } from './Settings.js';

export interface PostConfirmation {
  platform: Platform;
  id: string;
  url?: string;
}
