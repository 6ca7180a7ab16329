// 섹션 하나에 속한 피드 목록과 포커스 프롬프트
export interface FeedSource {
  urls: string[];
  prompt: string;
  displayName?: string;
}

export type FeedSources = Readonly<Record<string, FeedSource>>;
