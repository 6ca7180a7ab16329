import { z } from 'zod';

// 숫자 또는 숫자 문자열. 반올림 후 0~100 으로 자른다.
const ScoreValueSchema = z
  .union([z.number(), z.string().trim().min(1)])
  .pipe(z.coerce.number().finite())
  .transform((score) => Math.min(100, Math.max(0, Math.round(score))));

export const ScoreResultSchema = z.object({
  score: ScoreValueSchema,
  reason: z.string().trim().catch(''),
});

export type ScoreResult = z.infer<typeof ScoreResultSchema>;

export const SCORE_FAILED_REASON = 'Scoring failed';

export const FAILED_SCORE: Readonly<ScoreResult> = Object.freeze({
  score: 0,
  reason: SCORE_FAILED_REASON,
});

// 모델 응답이 깨져 있을 수 있는 유일한 지점. 실패하면 0점 처리.
export function parseScoreResult(raw: string): ScoreResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ...FAILED_SCORE };
  }

  const result = ScoreResultSchema.safeParse(parsed);
  return result.success ? result.data : { ...FAILED_SCORE };
}
