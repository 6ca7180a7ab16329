// 피드에서 읽은 기사. (title, link) 쌍이 식별 키다.
export interface NewsItem {
  title: string;
  link: string;
  summary: string;
  published: Date;
  source: string;
}

export interface ScoredNewsItem extends NewsItem {
  importance: number;
  importanceReason: string;
}

export type NewsSections = Record<string, NewsItem[]>;
export type ScoredSections = Record<string, ScoredNewsItem[]>;
