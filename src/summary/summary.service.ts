import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../common/errors';
import { pluralize } from '../common/utils/text.util';
import { BRIEF_CONFIG, BriefConfig } from '../config/brief.config';
import { FEED_SOURCES } from '../config/feed-sources';
import { FeedSources } from '../feeds/interfaces/feed-source.interface';
import { NewsItem } from '../feeds/interfaces/news-item.interface';
import { OpenAiService } from '../openai/openai.service';
import {
  EMPTY_SECTION_TEXT,
  INTRO_HEADING,
  NOTHING_MAJOR_TODAY,
  SUMMARY_UNAVAILABLE_TEXT,
  sectionDisplayName,
  sectionHeading,
} from './presentation';
import {
  introFallback,
  introInstruction,
  introRequest,
  summaryInstruction,
} from './prompts';
import { stripLinks } from './text-cleanup';

export interface SectionSummaryOptions {
  focus?: string;
  maxItems?: number;
}

export function capCounts(
  counts: Record<string, number>,
  ceiling: number,
): Record<string, number> {
  return Object.fromEntries(
    Object.entries(counts).map(([section, count]) => [section, Math.min(count, ceiling)]),
  );
}

// "3 articles from Guardian, 2 from BBC" 형태. 0건 섹션은 생략한다.
export function buildOverview(
  counts: Record<string, number>,
  sources?: FeedSources,
): string {
  const parts = Object.entries(counts)
    .filter(([, count]) => count > 0)
    .map(([section, count], index) => {
      const name = sectionDisplayName(section, sources);
      return index === 0
        ? `${count} ${pluralize(count, 'article', 'articles')} from ${name}`
        : `${count} from ${name}`;
    });

  return parts.length > 0 ? parts.join(', ') : NOTHING_MAJOR_TODAY;
}

export function countLine(shown: number, total: number): string {
  return `${shown} of ${total} fresh ${pluralize(total, 'story', 'stories')} picked for you.`;
}

@Injectable()
export class SummaryService {
  private readonly logger = new Logger(SummaryService.name);

  constructor(
    private readonly openAi: OpenAiService,
    @Inject(BRIEF_CONFIG) private readonly config: BriefConfig,
    @Inject(FEED_SOURCES) private readonly sources: FeedSources,
  ) {}

  async summarizeSection(
    section: string,
    items: NewsItem[],
    options: SectionSummaryOptions = {},
  ): Promise<string> {
    const heading = sectionHeading(section, this.sources);
    if (items.length === 0) {
      return `${heading}\n${EMPTY_SECTION_TEXT}`;
    }

    const top = items.slice(0, options.maxItems ?? this.config.maxItems);
    const user =
      'Summarize the following articles as bullet points for a quick brief:\n' +
      top.map((item) => `- ${item.title}`).join('\n');

    try {
      const response = await this.openAi.chatText(
        summaryInstruction(this.config.audience, options.focus),
        user,
      );
      const body = stripLinks(response);
      if (!body) {
        throw new Error('empty summary');
      }
      return `${heading}\n${countLine(top.length, items.length)}\n\n${body}`;
    } catch (error) {
      this.logger.warn(`[${section}] Summary generation failed: ${errorMessage(error)}`);
      return `${heading}\n${SUMMARY_UNAVAILABLE_TEXT}`;
    }
  }

  async morningIntro(counts: Record<string, number>): Promise<string> {
    const overview = buildOverview(capCounts(counts, this.config.maxItems), this.sources);
    const { readerName } = this.config;

    let text: string;
    try {
      text = stripLinks(
        await this.openAi.chatText(
          introInstruction(this.config.audience),
          introRequest(overview, readerName),
          { temperature: 0.7 },
        ),
      );
      if (!text) {
        throw new Error('empty intro');
      }
    } catch (error) {
      this.logger.warn(`Intro generation failed, using fallback: ${errorMessage(error)}`);
      text = introFallback(overview, readerName);
    }

    return `## ${INTRO_HEADING}\n${text}`;
  }
}
