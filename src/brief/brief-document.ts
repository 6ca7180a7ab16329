// 게시 직전의 중간 표현. 블록 종류는 이 다섯 가지로 닫혀 있다.
export type BriefBlock =
  | { kind: 'heading'; text: string }
  | { kind: 'bullet'; text: string }
  | { kind: 'paragraph'; text: string }
  | { kind: 'divider' }
  | { kind: 'audio'; label: string; url: string };

export interface AudioReference {
  label: string;
  url: string;
}

export interface BriefSection {
  name: string;
  text: string;
  itemCount: number;
}

export interface BriefDocument {
  date: string;
  intro: string;
  sections: BriefSection[];
  introAudio?: AudioReference;
  sectionAudio: Record<string, AudioReference>;
}

// "## " → heading, "- " → bullet, 그 외 비어 있지 않은 줄 → paragraph
export function textToBlocks(text: string): BriefBlock[] {
  const blocks: BriefBlock[] = [];
  for (const line of text.split(/\r?\n/)) {
    if (line.startsWith('## ')) {
      blocks.push({ kind: 'heading', text: line.slice(3).trim() });
    } else if (line.startsWith('- ')) {
      blocks.push({ kind: 'bullet', text: line.slice(2).trim() });
    } else if (line.trim() !== '') {
      blocks.push({ kind: 'paragraph', text: line.trim() });
    }
  }
  return blocks;
}

export function contentBlocks(document: BriefDocument): BriefBlock[] {
  const blocks = textToBlocks(document.intro);
  for (const section of document.sections) {
    blocks.push({ kind: 'divider' });
    blocks.push(...textToBlocks(section.text));
  }
  return blocks;
}

// 인트로 오디오가 먼저, 이후 섹션 순서대로
export function audioBlocks(document: BriefDocument): BriefBlock[] {
  const references: AudioReference[] = [];
  if (document.introAudio) {
    references.push(document.introAudio);
  }
  for (const section of document.sections) {
    const reference = document.sectionAudio[section.name];
    if (reference) {
      references.push(reference);
    }
  }
  return references.map((reference) => ({
    kind: 'audio',
    label: reference.label,
    url: reference.url,
  }));
}

export function renderMarkdown(document: BriefDocument): string {
  const parts = [document.intro, ...document.sections.map((section) => section.text)];
  const audio = audioBlocks(document).flatMap((block) =>
    block.kind === 'audio' ? [`- [${block.label}](${block.url})`] : [],
  );
  if (audio.length > 0) {
    parts.push(['## 🎧 Audio', ...audio].join('\n'));
  }
  return `# Daily Brief – ${document.date}\n\n${parts.join('\n\n---\n\n')}\n`;
}
