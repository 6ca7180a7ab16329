import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import Parser from 'rss-parser';
import { errorMessage } from '../common/errors';
import { hoursBefore, parseFirstDate } from '../common/utils/date.util';
import { BRIEF_CONFIG, BriefConfig } from '../config/brief.config';
import { FeedSource, FeedSources } from './interfaces/feed-source.interface';
import { NewsItem, NewsSections } from './interfaces/news-item.interface';

// rss-parser 기본 필드 외에 Atom/DC 의 updated 값을 함께 읽는다
export interface FeedEntryExtras {
  updated?: string;
}

export type ParsedFeed = Parser.Output<FeedEntryExtras>;
export type FeedEntry = ParsedFeed['items'][number];

const SUMMARY_MAX_LENGTH = 500;
const DEFAULT_TIMEOUT_MS = 30000;

export function entryPublishedAt(entry: FeedEntry): Date | null {
  return parseFirstDate(entry.pubDate, entry.isoDate, entry.updated);
}

// 본문 HTML 은 cheerio 로 텍스트만 추출
export function entrySummary(entry: FeedEntry): string {
  const snippet = entry.contentSnippet?.trim();
  const text = snippet
    ? snippet
    : cheerio
        .load(entry.content ?? entry.summary ?? '')
        .root()
        .text()
        .replace(/\s+/g, ' ')
        .trim();
  return text.length > SUMMARY_MAX_LENGTH
    ? text.substring(0, SUMMARY_MAX_LENGTH)
    : text;
}

export function toNewsItem(
  entry: FeedEntry,
  source: string,
  cutoff: Date,
): NewsItem | null {
  const published = entryPublishedAt(entry);
  if (!published || published.getTime() < cutoff.getTime()) {
    return null;
  }

  return {
    title: (entry.title ?? '').trim(),
    link: (entry.link ?? '').trim(),
    summary: entrySummary(entry),
    published,
    source,
  };
}

export function dedupeItems(items: NewsItem[]): NewsItem[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    const key = JSON.stringify([item.title, item.link]);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function sortByRecency(items: NewsItem[]): NewsItem[] {
  return [...items].sort(
    (a, b) => b.published.getTime() - a.published.getTime(),
  );
}

@Injectable()
export class FeedsService {
  private readonly logger = new Logger(FeedsService.name);
  private readonly http: AxiosInstance;
  private readonly parser = new Parser<Record<string, unknown>, FeedEntryExtras>({
    customFields: { item: ['updated'] },
  });

  constructor(@Optional() @Inject(BRIEF_CONFIG) config?: BriefConfig) {
    this.http = axios.create({
      timeout: config?.httpTimeoutMs ?? DEFAULT_TIMEOUT_MS,
      responseType: 'text',
      headers: {
        'User-Agent': 'morning-brief/0.1 (RSS Reader)',
        Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml',
      },
    });
  }

  async fetchSections(
    sources: FeedSources,
    windowHours = 24,
    now: Date = new Date(),
  ): Promise<NewsSections> {
    const cutoff = hoursBefore(now, windowHours);
    const result: NewsSections = {};

    for (const [name, source] of Object.entries(sources)) {
      result[name] = await this.fetchSection(name, source, cutoff);
    }

    return result;
  }

  async fetchSection(
    name: string,
    source: FeedSource,
    cutoff: Date,
  ): Promise<NewsItem[]> {
    const items: NewsItem[] = [];

    for (const url of source.urls) {
      try {
        const feed = await this.fetchFeed(url);
        const label = feed.title?.trim() || name;
        let kept = 0;
        for (const entry of feed.items) {
          const item = toNewsItem(entry, label, cutoff);
          if (item) {
            items.push(item);
            kept++;
          }
        }
        this.logger.log(
          `[${name}] ${url}: ${kept}/${feed.items.length} entries within window`,
        );
      } catch (error) {
        // 한 피드의 실패가 섹션 전체를 멈추지 않도록 건너뛴다
        this.logger.warn(`[${name}] Skipping ${url}: ${errorMessage(error)}`);
      }
    }

    const fresh = sortByRecency(dedupeItems(items));
    this.logger.log(`[${name}] ${fresh.length} fresh items after de-duplication`);
    return fresh;
  }

  async fetchFeed(url: string): Promise<ParsedFeed> {
    const response = await this.http.get<string>(url);
    return this.parseFeed(response.data);
  }

  parseFeed(xml: string): Promise<ParsedFeed> {
    return this.parser.parseString(xml);
  }
}
