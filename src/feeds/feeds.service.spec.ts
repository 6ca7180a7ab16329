import {
  FeedEntry,
  FeedsService,
  ParsedFeed,
  dedupeItems,
  entrySummary,
  sortByRecency,
  toNewsItem,
} from './feeds.service';
import { newsItem } from '../testing/fixtures';

const RSS_XML = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Alpha Wire</title>
    <link>https://alpha.test</link>
    <description>Alpha news</description>
    <item>
      <title>Harbour reopens</title>
      <link>https://alpha.test/harbour</link>
      <pubDate>Fri, 03 Jan 2025 10:00:00 GMT</pubDate>
      <description>Ships are back.</description>
    </item>
    <item>
      <title>Undated notice</title>
      <link>https://alpha.test/notice</link>
      <description>No date here.</description>
    </item>
  </channel>
</rss>`;

function feed(title: string | undefined, items: FeedEntry[]): ParsedFeed {
  return { title, items };
}

describe('FeedsService', () => {
  let service: FeedsService;

  beforeEach(() => {
    service = new FeedsService();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('parses RSS XML and drops entries without a date', async () => {
    const parsed = await service.parseFeed(RSS_XML);
    const cutoff = new Date('2025-01-02T00:00:00Z');

    expect(parsed.title).toBe('Alpha Wire');
    expect(parsed.items).toHaveLength(2);

    const items = parsed.items.map((entry) => toNewsItem(entry, 'Alpha Wire', cutoff));
    expect(items[1]).toBeNull();
    expect(items[0]).toMatchObject({
      title: 'Harbour reopens',
      link: 'https://alpha.test/harbour',
      source: 'Alpha Wire',
    });
    expect(items[0]?.published.toISOString()).toBe('2025-01-03T10:00:00.000Z');
  });

  describe('fetchSection', () => {
    const cutoff = new Date('2024-12-31T00:00:00Z');

    it('sorts newest first regardless of input order', async () => {
      jest.spyOn(service, 'fetchFeed').mockResolvedValue(
        feed('Wire', [
          { title: 'C', link: 'https://n.test/c', pubDate: '2025-01-03T09:00:00Z' },
          { title: 'A', link: 'https://n.test/a', pubDate: '2025-01-01T09:00:00Z' },
          { title: 'B', link: 'https://n.test/b', pubDate: '2025-01-02T09:00:00Z' },
        ]),
      );

      const items = await service.fetchSection('alpha', { urls: ['https://n.test/rss'], prompt: '' }, cutoff);

      expect(items.map((item) => item.published.toISOString().substring(0, 10))).toEqual([
        '2025-01-03',
        '2025-01-02',
        '2025-01-01',
      ]);
    });

    it('excludes items older than the cutoff and keeps one exactly at it', async () => {
      jest.spyOn(service, 'fetchFeed').mockResolvedValue(
        feed('Wire', [
          { title: 'Old', link: 'https://n.test/old', pubDate: '2024-12-30T23:59:59Z' },
          { title: 'Edge', link: 'https://n.test/edge', pubDate: '2024-12-31T00:00:00Z' },
        ]),
      );

      const items = await service.fetchSection('alpha', { urls: ['https://n.test/rss'], prompt: '' }, cutoff);

      expect(items.map((item) => item.title)).toEqual(['Edge']);
    });

    it('falls back to isoDate and updated when pubDate is unusable', async () => {
      jest.spyOn(service, 'fetchFeed').mockResolvedValue(
        feed('Wire', [
          { title: 'Iso', link: 'https://n.test/iso', pubDate: 'garbage', isoDate: '2025-01-02T00:00:00Z' },
          { title: 'Updated', link: 'https://n.test/upd', updated: '2025-01-01T00:00:00Z' },
          { title: 'None', link: 'https://n.test/none' },
        ]),
      );

      const items = await service.fetchSection('alpha', { urls: ['https://n.test/rss'], prompt: '' }, cutoff);

      expect(items.map((item) => item.title)).toEqual(['Iso', 'Updated']);
    });

    it('de-duplicates on exact (title, link) across endpoints', async () => {
      jest.spyOn(service, 'fetchFeed').mockImplementation(async (url: string) =>
        feed(url === 'https://one.test/rss' ? 'One' : 'Two', [
          { title: 'Same', link: 'https://n.test/same', pubDate: '2025-01-02T00:00:00Z' },
          {
            title: 'Same',
            link: url === 'https://one.test/rss' ? 'https://n.test/same' : 'https://n.test/other',
            pubDate: '2025-01-01T00:00:00Z',
          },
        ]),
      );

      const items = await service.fetchSection(
        'alpha',
        { urls: ['https://one.test/rss', 'https://two.test/rss'], prompt: '' },
        cutoff,
      );

      expect(items.map((item) => [item.title, item.link, item.source])).toEqual([
        ['Same', 'https://n.test/same', 'One'],
        ['Same', 'https://n.test/other', 'Two'],
      ]);
    });

    it('skips a failing endpoint and keeps the others', async () => {
      jest.spyOn(service, 'fetchFeed').mockImplementation(async (url: string) => {
        if (url === 'https://broken.test/rss') {
          throw new Error('socket hang up');
        }
        return feed(undefined, [
          { title: 'Survivor', link: 'https://n.test/ok', pubDate: '2025-01-02T00:00:00Z' },
        ]);
      });

      const items = await service.fetchSection(
        'alpha',
        { urls: ['https://broken.test/rss', 'https://ok.test/rss'], prompt: '' },
        cutoff,
      );

      expect(items).toHaveLength(1);
      expect(items[0].source).toBe('alpha');
    });
  });

  it('fetchSections keeps empty sections and applies the window', async () => {
    jest.spyOn(service, 'fetchFeed').mockImplementation(async (url: string) =>
      url === 'https://alpha.test/rss'
        ? feed('Alpha', [
            { title: 'Fresh', link: 'https://n.test/fresh', pubDate: '2025-01-04T06:00:00Z' },
            { title: 'Stale', link: 'https://n.test/stale', pubDate: '2025-01-02T06:00:00Z' },
          ])
        : feed('Beta', []),
    );

    const sections = await service.fetchSections(
      {
        alpha: { urls: ['https://alpha.test/rss'], prompt: '' },
        beta: { urls: ['https://beta.test/rss'], prompt: '' },
      },
      24,
      new Date('2025-01-04T12:00:00Z'),
    );

    expect(Object.keys(sections)).toEqual(['alpha', 'beta']);
    expect(sections.alpha.map((item) => item.title)).toEqual(['Fresh']);
    expect(sections.beta).toEqual([]);
  });
});

describe('feed item helpers', () => {
  it('entrySummary prefers the snippet and strips HTML otherwise', () => {
    expect(entrySummary({ contentSnippet: '  Plain text  ', content: '<p>Ignored</p>' })).toBe(
      'Plain text',
    );
    expect(entrySummary({ content: '<p>Hello <b>world</b></p>\n<p>again</p>' })).toBe(
      'Hello world again',
    );
    expect(entrySummary({ content: `<p>${'x'.repeat(600)}</p>` })).toHaveLength(500);
  });

  it('dedupeItems keeps the first occurrence only', () => {
    const first = newsItem({ title: 'T', link: 'L', source: 'first' });
    const second = newsItem({ title: 'T', link: 'L', source: 'second' });
    const sameTitle = newsItem({ title: 'T', link: 'L2' });

    expect(dedupeItems([first, second, sameTitle])).toEqual([first, sameTitle]);
  });

  it('sortByRecency does not mutate its input', () => {
    const older = newsItem({ published: new Date('2025-01-01T00:00:00Z') });
    const newer = newsItem({ published: new Date('2025-01-02T00:00:00Z') });
    const input = [older, newer];

    expect(sortByRecency(input)).toEqual([newer, older]);
    expect(input).toEqual([older, newer]);
  });
});
