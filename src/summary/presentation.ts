import { displayName } from '../common/utils/text.util';
import { FeedSources } from '../feeds/interfaces/feed-source.interface';

// 섹션 키 → 제목 이모지
export const SECTION_EMOJI: Readonly<Record<string, string>> = Object.freeze({
  guardian: '🏛️',
  bbc: '📺',
  montreal_gazette: '🍁',
  ai: '🤖',
  world: '🌍',
  tech: '💻',
});

export const DEFAULT_SECTION_EMOJI = '📰';
export const INTRO_HEADING = '🌅 Morning Briefing';
export const INTRO_AUDIO_LABEL = '🌅 Morning Intro';
export const EMPTY_SECTION_TEXT = '_No fresh items found._';
export const SUMMARY_UNAVAILABLE_TEXT = '_Summary unavailable today._';
export const NOTHING_MAJOR_TODAY = 'nothing major today';

export function sectionDisplayName(section: string, sources?: FeedSources): string {
  return sources?.[section]?.displayName ?? displayName(section);
}

export function sectionHeading(section: string, sources?: FeedSources): string {
  const emoji = SECTION_EMOJI[section] ?? DEFAULT_SECTION_EMOJI;
  return `## ${emoji} ${sectionDisplayName(section, sources)}`;
}

export function sectionAudioLabel(section: string, sources?: FeedSources): string {
  return `${sectionDisplayName(section, sources)} – Section Audio`;
}
