// en-CA 로케일은 YYYY-MM-DD 형식을 돌려준다
export function todayString(timeZone: string, now: Date = new Date()): string {
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(now);
}

const NAIVE_ISO = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;
const NAIVE_RFC822 = /^(?:[A-Za-z]{3},\s*)?\d{1,2}\s+[A-Za-z]{3}\s+\d{4}\s+\d{2}:\d{2}(?::\d{2})?$/;

// 오프셋이 없는 시각은 프로세스 TZ 가 아니라 UTC 로 읽는다
function asUtc(value: string): string {
  const iso = NAIVE_ISO.exec(value);
  if (iso) {
    return `${iso[1]}T${iso[2]}Z`;
  }
  return NAIVE_RFC822.test(value) ? `${value} GMT` : value;
}

// Date가 해석할 수 있는 첫 번째 후보를 사용한다. 결과는 UTC 기준 시각이다.
export function parseFirstDate(
  ...candidates: Array<string | undefined>
): Date | null {
  for (const candidate of candidates) {
    if (!candidate || !candidate.trim()) continue;
    const parsed = new Date(asUtc(candidate.trim()));
    if (!Number.isNaN(parsed.getTime())) {
      return parsed;
    }
  }
  return null;
}

export function hoursBefore(now: Date, hours: number): Date {
  return new Date(now.getTime() - hours * 60 * 60 * 1000);
}
