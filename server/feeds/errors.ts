import type { FeedName } from '../types.js';

export class FeedError extends Error {
  readonly feed: FeedName;

  constructor(feed: FeedName, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FeedError';
    this.feed = feed;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}
