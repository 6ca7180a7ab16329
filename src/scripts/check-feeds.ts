import 'reflect-metadata';
import * as dotenv from 'dotenv';
import * as path from 'path';
import { DEFAULT_FEED_SOURCES } from '../config/feed-sources';
import { FeedSources } from '../feeds/interfaces/feed-source.interface';
import { FeedsService } from '../feeds/feeds.service';
import { sectionDisplayName } from '../summary/presentation';

// .env 파일 로드 (자격 증명은 필요 없음)
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

interface CheckOptions {
  sections: string[];
  hours: number;
}

function parseArgs(argv: string[]): CheckOptions {
  const sections: string[] = [];
  let hours = Number(process.env.NEWS_SINCE_HOURS) || 24;

  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--hours') {
      const value = Number(argv[++i]);
      if (!Number.isFinite(value) || value <= 0) {
        throw new Error('--hours expects a positive number');
      }
      hours = value;
    } else {
      sections.push(argv[i]);
    }
  }

  return { sections, hours };
}

function selectSources(names: string[]): FeedSources {
  if (names.length === 0) return DEFAULT_FEED_SOURCES;

  const unknown = names.filter((name) => !(name in DEFAULT_FEED_SOURCES));
  if (unknown.length > 0) {
    throw new Error(
      `Unknown section(s): ${unknown.join(', ')}. Available: ${Object.keys(DEFAULT_FEED_SOURCES).join(', ')}`,
    );
  }
  return Object.fromEntries(names.map((name) => [name, DEFAULT_FEED_SOURCES[name]]));
}

async function checkFeeds() {
  const options = parseArgs(process.argv.slice(2));
  const sources = selectSources(options.sections);
  const service = new FeedsService();

  console.log(`피드 점검 시작 (최근 ${options.hours}시간)`);
  const sections = await service.fetchSections(sources, options.hours);

  for (const [name, items] of Object.entries(sections)) {
    console.log(`\n${'-'.repeat(40)}`);
    console.log(`  ${sectionDisplayName(name, sources)} - ${items.length} articles`);
    console.log(`  Focus: ${sources[name].prompt}`);
    console.log('-'.repeat(40));

    items.forEach((item, index) => {
      console.log(`\n${index + 1}. ${item.title}`);
      console.log(`   URL: ${item.link}`);
      console.log(`   Published: ${item.published.toISOString()}`);
      console.log(`   Source: ${item.source}`);
      if (item.summary) {
        const summary =
          item.summary.length > 200 ? `${item.summary.substring(0, 200)}...` : item.summary;
        console.log(`   Summary: ${summary}`);
      }
    });
  }
}

checkFeeds().catch((error: unknown) => {
  console.error('오류 발생:', error instanceof Error ? error.message : error);
  process.exit(1);
});
