import { FeedSources } from '../feeds/interfaces/feed-source.interface';

export const FEED_SOURCES = Symbol('FEED_SOURCES');

export const DEFAULT_FEED_SOURCES: FeedSources = Object.freeze({
  guardian: {
    urls: [
      'https://www.theguardian.com/world/rss',
      'https://www.theguardian.com/uk/culture/rss',
      'https://www.theguardian.com/lifeandstyle/rss',
    ],
    prompt: 'Mix of world, culture, and lifestyle stories.',
  },
  bbc: {
    displayName: 'BBC',
    urls: [
      'https://feeds.bbci.co.uk/news/rss.xml',
      'https://feeds.bbci.co.uk/news/technology/rss.xml',
    ],
    prompt: 'Prioritize Scotland and broader UK coverage.',
  },
  montreal_gazette: {
    urls: ['https://montrealgazette.com/category/news/local-news/feed'],
    prompt: 'Local Montreal news with civic impact.',
  },
  ai: {
    displayName: 'AI',
    urls: [
      'https://feeds.arstechnica.com/arstechnica/ai',
      'https://www.techmeme.com/feed.xml',
    ],
    prompt: 'AI/tech developments relevant to startups.',
  },
});
