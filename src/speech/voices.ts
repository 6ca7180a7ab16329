export const VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;

export type Voice = (typeof VOICES)[number];

// random 은 [0, 1) 범위 값을 돌려주는 함수
export function pickVoice(random: () => number = Math.random): Voice {
  const index = Math.min(VOICES.length - 1, Math.floor(random() * VOICES.length));
  return VOICES[index];
}
