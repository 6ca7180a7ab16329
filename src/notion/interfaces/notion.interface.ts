export interface NotionPage {
  id: string;
  url: string;
}

export interface NotionRichText {
  type: 'text';
  text: { content: string };
}

export type NotionBlock =
  | { object: 'block'; type: 'heading_2'; heading_2: { rich_text: NotionRichText[] } }
  | { object: 'block'; type: 'heading_3'; heading_3: { rich_text: NotionRichText[] } }
  | { object: 'block'; type: 'paragraph'; paragraph: { rich_text: NotionRichText[] } }
  | {
      object: 'block';
      type: 'bulleted_list_item';
      bulleted_list_item: { rich_text: NotionRichText[] };
    }
  | { object: 'block'; type: 'divider'; divider: Record<string, never> }
  | {
      object: 'block';
      type: 'audio';
      audio: { type: 'external'; external: { url: string } };
    };

export interface NotionQueryResponse {
  results: NotionPage[];
}
