import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { BriefBlock } from '../brief/brief-document';
import { BRIEF_CONFIG, BriefConfig } from '../config/brief.config';
import { NotionPage, NotionQueryResponse } from './interfaces/notion.interface';
import { APPEND_CHUNK_SIZE, chunk, richText, toNotionBlocks } from './notion-blocks';

export const NOTION_API_URL = 'https://api.notion.com/v1';
export const NOTION_VERSION = '2022-06-28';

@Injectable()
export class NotionService {
  private readonly logger = new Logger(NotionService.name);
  private readonly http: AxiosInstance;
  private readonly databaseId: string;
  private readonly titleProperty: string;

  constructor(@Inject(BRIEF_CONFIG) config: BriefConfig) {
    this.databaseId = config.notion.databaseId;
    this.titleProperty = config.notion.titleProperty;
    this.http = axios.create({
      baseURL: NOTION_API_URL,
      timeout: config.httpTimeoutMs,
      headers: {
        Authorization: `Bearer ${config.notion.token}`,
        'Notion-Version': NOTION_VERSION,
        'Content-Type': 'application/json',
      },
    });
  }

  // 제목이 정확히 일치하는 페이지를 찾고, 없으면 새로 만든다
  async findOrCreateDailyPage(title: string): Promise<NotionPage> {
    const { data } = await this.http.post<NotionQueryResponse>(
      `/databases/${this.databaseId}/query`,
      {
        filter: { property: this.titleProperty, title: { equals: title } },
        page_size: 1,
      },
    );

    const existing = data.results[0];
    if (existing) {
      this.logger.log(`Found existing page for ${title}: ${existing.url}`);
      return { id: existing.id, url: existing.url };
    }

    const created = await this.http.post<NotionPage>('/pages', {
      parent: { database_id: this.databaseId },
      properties: {
        [this.titleProperty]: { title: richText(title) },
      },
    });
    this.logger.log(`Created page for ${title}: ${created.data.url}`);
    return { id: created.data.id, url: created.data.url };
  }

  // 기존 내용 뒤에 이어 붙인다 (교체하지 않음)
  async appendBlocks(pageId: string, blocks: BriefBlock[]): Promise<number> {
    const children = blocks.flatMap(toNotionBlocks);
    for (const part of chunk(children, APPEND_CHUNK_SIZE)) {
      await this.http.patch(`/blocks/${pageId}/children`, { children: part });
    }
    this.logger.log(`Appended ${children.length} blocks to ${pageId}`);
    return children.length;
  }

  async addComment(pageId: string, text: string): Promise<void> {
    await this.http.post('/comments', {
      parent: { page_id: pageId },
      rich_text: richText(text),
    });
    this.logger.log(`Comment posted on ${pageId}`);
  }
}
