import React from 'react';
import type { FeedName, FeedStatus } from '../types';
import { FEED_LABELS } from '../types';

const FEEDS: FeedName[] = ['solarWind', 'quakes', 'kp'];

export const FeedStatusList: React.FC<{ feeds: Record<FeedName, FeedStatus> }> = ({ feeds }) => (
  <ul className="feed-status">
    {FEEDS.map(name => {
      const feed = feeds[name];
      return (
        <li key={name} className={feed.status === 'ok' ? 'feed-ok' : 'feed-failed'}>
          {FEED_LABELS[name]}: {feed.status === 'ok' ? 'ok' : `unavailable (${feed.reason})`}
        </li>
      );
    })}
  </ul>
);
