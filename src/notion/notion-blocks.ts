import { BriefBlock } from '../brief/brief-document';
import { NotionBlock, NotionRichText } from './interfaces/notion.interface';

// Notion rich_text 하나의 content 최대 길이
export const RICH_TEXT_LIMIT = 2000;
// children 추가 한 번에 허용되는 블록 수
export const APPEND_CHUNK_SIZE = 100;

export function richText(content: string): NotionRichText[] {
  const parts: NotionRichText[] = [];
  for (let start = 0; start < content.length; start += RICH_TEXT_LIMIT) {
    parts.push({
      type: 'text',
      text: { content: content.substring(start, start + RICH_TEXT_LIMIT) },
    });
  }
  return parts.length > 0 ? parts : [{ type: 'text', text: { content: '' } }];
}

export function toNotionBlocks(block: BriefBlock): NotionBlock[] {
  switch (block.kind) {
    case 'heading':
      return [{ object: 'block', type: 'heading_2', heading_2: { rich_text: richText(block.text) } }];
    case 'bullet':
      return [
        {
          object: 'block',
          type: 'bulleted_list_item',
          bulleted_list_item: { rich_text: richText(block.text) },
        },
      ];
    case 'paragraph':
      return [{ object: 'block', type: 'paragraph', paragraph: { rich_text: richText(block.text) } }];
    case 'divider':
      return [{ object: 'block', type: 'divider', divider: {} }];
    case 'audio':
      return [
        { object: 'block', type: 'heading_3', heading_3: { rich_text: richText(block.label) } },
        { object: 'block', type: 'audio', audio: { type: 'external', external: { url: block.url } } },
      ];
  }
}

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}
