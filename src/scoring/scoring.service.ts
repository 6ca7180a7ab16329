import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../common/errors';
import { BRIEF_CONFIG, BriefConfig } from '../config/brief.config';
import { NewsItem, ScoredNewsItem } from '../feeds/interfaces/news-item.interface';
import { OpenAiService } from '../openai/openai.service';
import { FAILED_SCORE, ScoreResult, parseScoreResult } from './score-result';

export function scoringInstruction(audience: string, focus?: string): string {
  const base =
    'You are a news prioritization model. Score the IMPORTANCE of a news item from 0 to 100 ' +
    `for ${audience}. Consider recency (last 24h), broad impact, ` +
    'business/tech relevance, local relevance, and credibility. ' +
    'Return ONLY a JSON object: {"score": <0-100>, "reason": "..."}.';
  return focus ? `${base} Focus on: ${focus}` : base;
}

export function scoringRequest(item: NewsItem): string {
  return [
    `Title: ${item.title}`,
    `URL: ${item.link}`,
    `Published: ${item.published.toISOString()}`,
    `Summary: ${item.summary}`,
  ].join('\n');
}

export function sortByImportance(items: ScoredNewsItem[]): ScoredNewsItem[] {
  return [...items].sort((a, b) => b.importance - a.importance);
}

@Injectable()
export class ScoringService {
  private readonly logger = new Logger(ScoringService.name);

  constructor(
    private readonly openAi: OpenAiService,
    @Inject(BRIEF_CONFIG) private readonly config: BriefConfig,
  ) {}

  async scoreItems(items: NewsItem[], focus?: string): Promise<ScoredNewsItem[]> {
    if (items.length === 0) {
      return [];
    }

    const system = scoringInstruction(this.config.audience, focus);
    const scored: ScoredNewsItem[] = [];

    for (const item of items) {
      const result = await this.scoreItem(system, item);
      scored.push({
        ...item,
        importance: result.score,
        importanceReason: result.reason,
      });
    }

    return sortByImportance(scored);
  }

  private async scoreItem(system: string, item: NewsItem): Promise<ScoreResult> {
    try {
      const raw = await this.openAi.chatJson(system, scoringRequest(item));
      return parseScoreResult(raw);
    } catch (error) {
      this.logger.warn(`Scoring failed for "${item.title}": ${errorMessage(error)}`);
      return { ...FAILED_SCORE };
    }
  }
}
