// 표시용(cleanForText)과 낭독용(cleanForTts) 정리 함수.
// 한 번의 패스가 문자열을 줄이기만 하므로 변화가 없을 때까지 반복하면 고정점이 된다.

// URL 안의 괄호는 한 단계까지 허용 (예: /wiki/Foo_(bar))
const MARKDOWN_LINK = /\[([^\]\n]*)\]\(((?:[^()\s]|\([^()\s]*\))*)\)/g;
const DATE_PARENTHETICAL = /[ \t]*\((?:date|published)\s*:[^)\n]*\)/gi;
const BARE_DATE_PARENTHETICAL = /[ \t]*\(\s*\d{4}-\d{2}-\d{2}\s*\)/g;
const CALL_TO_ACTION = /\b(?:read|view|click|watch|listen)\s+(?:here|more)\b/gi;
const PROVIDER_INTRO_LINE = /^[^\n]*\bnews from\b[^\n]*\bwe have\b[^\n]*$/gim;
const BARE_URL = /\b(?:https?:\/\/|www\.)[^\s)\]]+/gi;
const EMPHASIS = /\*\*|__|`/g;
const HEADING_MARKER = /^#{1,6}[ \t]+/gm;

function normalizeWhitespace(text: string): string {
  return text
    .replace(/[ \t]{2,}/g, ' ')
    .replace(/[ \t]+([.,;:!?])/g, '$1')
    .replace(/[ \t]+$/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function commonPass(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(MARKDOWN_LINK, '$1')
    .replace(DATE_PARENTHETICAL, '')
    .replace(BARE_DATE_PARENTHETICAL, '')
    .replace(CALL_TO_ACTION, '')
    .replace(PROVIDER_INTRO_LINE, '');
}

function untilStable(text: string, pass: (input: string) => string): string {
  let current = text;
  for (;;) {
    const next = pass(current);
    if (next === current) return current;
    current = next;
  }
}

export function cleanForText(text: string): string {
  return untilStable(text, (input) => normalizeWhitespace(commonPass(input)));
}

export function cleanForTts(text: string): string {
  return untilStable(text, (input) =>
    normalizeWhitespace(
      commonPass(input)
        .replace(BARE_URL, '')
        .replace(EMPHASIS, '')
        .replace(HEADING_MARKER, ''),
    ),
  );
}

// 요약 응답에 남은 링크 제거: 마크다운 링크는 앵커 텍스트만, 맨 URL 은 삭제
export function stripLinks(text: string): string {
  return normalizeWhitespace(
    text.replace(MARKDOWN_LINK, '$1').replace(BARE_URL, ''),
  );
}
