import { Inject, Injectable, Logger } from '@nestjs/common';
import { PublishError, errorMessage } from '../common/errors';
import { todayString } from '../common/utils/date.util';
import { pluralize } from '../common/utils/text.util';
import { BRIEF_CONFIG, BriefConfig } from '../config/brief.config';
import { FEED_SOURCES } from '../config/feed-sources';
import { FeedSources } from '../feeds/interfaces/feed-source.interface';
import { ScoredSections } from '../feeds/interfaces/news-item.interface';
import { FeedsService } from '../feeds/feeds.service';
import { NotionPage } from '../notion/interfaces/notion.interface';
import { NotionService } from '../notion/notion.service';
import { ScoringService } from '../scoring/scoring.service';
import { AudioConverterService } from '../speech/audio-converter.service';
import { SpeechService } from '../speech/speech.service';
import { INTRO_AUDIO_LABEL, sectionAudioLabel } from '../summary/presentation';
import { SummaryService } from '../summary/summary.service';
import { cleanForText } from '../summary/text-cleanup';
import {
  BriefDocument,
  audioBlocks,
  contentBlocks,
  renderMarkdown,
} from './brief-document';
import { BriefStorageService } from './brief-storage.service';

export interface BriefRunResult {
  date: string;
  document: BriefDocument;
  page: NotionPage;
  markdownPath: string;
}

export function notificationText(document: BriefDocument): string {
  const parts: string[] = [];
  if (document.introAudio) {
    parts.push('intro');
  }
  const sectionCount = Object.keys(document.sectionAudio).length;
  if (sectionCount > 0) {
    parts.push(`${sectionCount} section ${pluralize(sectionCount, 'audio', 'audios')}`);
  }
  return parts.length > 0
    ? `✅ Daily news brief is ready – ${parts.join(' + ')} added.`
    : '✅ Daily news brief is ready.';
}

@Injectable()
export class BriefService {
  private readonly logger = new Logger(BriefService.name);

  constructor(
    @Inject(BRIEF_CONFIG) private readonly config: BriefConfig,
    @Inject(FEED_SOURCES) private readonly sources: FeedSources,
    private readonly feedsService: FeedsService,
    private readonly scoringService: ScoringService,
    private readonly summaryService: SummaryService,
    private readonly speechService: SpeechService,
    private readonly audioConverter: AudioConverterService,
    private readonly storage: BriefStorageService,
    private readonly notionService: NotionService,
  ) {}

  async run(now: Date = new Date()): Promise<BriefRunResult> {
    const date = todayString(this.config.timeZone, now);
    this.logger.log(`Building daily brief for ${date}`);

    // 1) 수집 + 중요도 채점
    const sections = await this.feedsService.fetchSections(
      this.sources,
      this.config.sinceHours,
      now,
    );
    const scored: ScoredSections = {};
    for (const [name, items] of Object.entries(sections)) {
      this.logger.log(`[${name}] Scoring ${items.length} items`);
      scored[name] = await this.scoringService.scoreItems(items, this.sources[name]?.prompt);
    }

    // 2) 섹션별 요약 + 낭독
    await this.storage.ensureDayDir(date);
    const document: BriefDocument = { date, intro: '', sections: [], sectionAudio: {} };

    for (const [name, items] of Object.entries(scored)) {
      const text = cleanForText(
        await this.summaryService.summarizeSection(name, items, {
          focus: this.sources[name]?.prompt,
          maxItems: this.config.maxItems,
        }),
      );
      document.sections.push({ name, text, itemCount: items.length });

      if (items.length === 0) {
        continue;
      }
      const url = await this.narrate(date, name, text);
      if (url) {
        document.sectionAudio[name] = { label: sectionAudioLabel(name, this.sources), url };
      }
    }

    // 3) 개인화 인트로
    const counts = Object.fromEntries(
      Object.entries(scored).map(([name, items]) => [name, items.length]),
    );
    document.intro = cleanForText(await this.summaryService.morningIntro(counts));
    const introUrl = await this.narrate(date, 'intro', document.intro);
    if (introUrl) {
      document.introAudio = { label: INTRO_AUDIO_LABEL, url: introUrl };
    }

    if (!this.config.githubRepo) {
      this.logger.warn('GITHUB_REPO is not set; audio will not be linked from the page');
    }

    const markdownPath = await this.storage.save(date, 'brief.md', renderMarkdown(document));

    // 4) 게시
    const page = await this.publish(document);
    this.logger.log(`Daily brief for ${date} published: ${page.url}`);

    return { date, document, page, markdownPath };
  }

  // 합성이나 저장이 실패하면 해당 섹션 오디오만 포기한다
  private async narrate(date: string, name: string, text: string): Promise<string | undefined> {
    let mp3: Buffer;
    let publishedPath: string;
    try {
      mp3 = await this.speechService.synthesize(text);
      publishedPath = await this.storage.save(date, `${name}.mp3`, mp3);
    } catch (error) {
      this.logger.warn(`[${name}] Narration failed: ${errorMessage(error)}`);
      return undefined;
    }

    if (this.config.oggAudio) {
      try {
        const ogg = await this.audioConverter.mp3ToOgg(mp3);
        publishedPath = await this.storage.save(date, `${name}.ogg`, ogg);
      } catch (error) {
        this.logger.warn(`[${name}] OGG conversion failed, keeping MP3: ${errorMessage(error)}`);
      }
    }

    return this.storage.publicUrl(publishedPath);
  }

  private async publish(document: BriefDocument): Promise<NotionPage> {
    try {
      const page = await this.notionService.findOrCreateDailyPage(document.date);
      await this.notionService.appendBlocks(page.id, contentBlocks(document));

      const audio = audioBlocks(document);
      if (audio.length > 0) {
        await this.notionService.appendBlocks(page.id, audio);
      }

      await this.notionService.addComment(page.id, notificationText(document));
      return page;
    } catch (error) {
      this.logger.error(`Publishing failed: ${errorMessage(error)}`);
      throw new PublishError(`Failed to publish brief for ${document.date}`, error);
    }
  }
}
