import { AxiosHeaders, AxiosResponse } from 'axios';
import { BriefConfig } from '../config/brief.config';
import { FeedSources } from '../feeds/interfaces/feed-source.interface';
import { NewsItem } from '../feeds/interfaces/news-item.interface';

export function testConfig(overrides: Partial<BriefConfig> = {}): BriefConfig {
  return {
    openai: {
      apiKey: 'test-openai-key',
      baseUrl: 'https://llm.test/v1',
      model: 'gpt-test',
      ttsModel: 'tts-test',
    },
    notion: {
      token: 'test-notion-token',
      databaseId: 'db-test',
      titleProperty: 'Name',
    },
    outputDir: 'public/daily',
    timeZone: 'UTC',
    sinceHours: 24,
    maxItems: 5,
    audience: 'a test reader',
    githubBranch: 'main',
    oggAudio: false,
    httpTimeoutMs: 1000,
    ...overrides,
  };
}

export const FIXTURE_SOURCES: FeedSources = {
  alpha: { urls: ['https://alpha.test/rss'], prompt: 'Alpha focus' },
  beta: { urls: ['https://beta.test/rss'], prompt: '' },
};

export function newsItem(overrides: Partial<NewsItem> = {}): NewsItem {
  return {
    title: 'Story',
    link: 'https://news.test/story',
    summary: 'A short excerpt.',
    published: new Date('2025-01-04T08:00:00Z'),
    source: 'Test Wire',
    ...overrides,
  };
}

export function axiosResponse<T>(data: T): AxiosResponse<T> {
  return {
    data,
    status: 200,
    statusText: 'OK',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}
