export function summaryInstruction(audience: string, focus?: string): string {
  const base =
    `You summarize news items for ${audience}. ` +
    'Write one crisp, factual bullet per article, starting each line with "- ". ' +
    'Follow each bullet with a "- Why it matters:" line. ' +
    'Do not include URLs, links, dates, or phrases like "read more".';
  return focus ? `${base} Focus on: ${focus}` : base;
}

export function introInstruction(audience: string): string {
  return (
    `You write the spoken opening of a personal morning news brief for ${audience}. ` +
    'Keep it warm, calm, and under 120 words. Plain text only, no markdown headings, no links.'
  );
}

// 인사 → 한 줄 성찰 → 오늘의 개요 → 사람 이야기 한 줄, 네 부분 템플릿
export function introRequest(overview: string, readerName?: string): string {
  const greeting = readerName ? `Good morning, ${readerName}!` : 'Good morning!';
  return [
    'Write four short paragraphs, in this order:',
    `1. A greeting that starts with "${greeting}"`,
    '2. One reflective line to start the day with intention.',
    `3. Today's overview, stating exactly: ${overview}.`,
    '4. One light, human-interest line to carry into the day.',
  ].join('\n');
}

export function introFallback(overview: string, readerName?: string): string {
  const greeting = readerName ? `Good morning, ${readerName}!` : 'Good morning!';
  return `${greeting} Here is your brief for today: ${overview}.`;
}
