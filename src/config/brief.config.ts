import { LogLevel } from '@nestjs/common';
import { z } from 'zod';
import { ConfigurationError } from '../common/errors';

export const BRIEF_CONFIG = Symbol('BRIEF_CONFIG');

export interface OpenAiSettings {
  apiKey: string;
  baseUrl: string;
  model: string;
  ttsModel: string;
}

export interface NotionSettings {
  token: string;
  databaseId: string;
  titleProperty: string;
}

export interface BriefConfig {
  openai: OpenAiSettings;
  notion: NotionSettings;
  outputDir: string;
  timeZone: string;
  sinceHours: number;
  maxItems: number;
  readerName?: string;
  audience: string;
  githubRepo?: string;
  githubBranch: string;
  oggAudio: boolean;
  httpTimeoutMs: number;
}

export const DEFAULT_TIMEZONE = 'America/Toronto';
export const DEFAULT_CRON = '0 6 * * *';

export type EnvReader = (key: string) => string | undefined;

const MISSING = 'is required';
const POSITIVE_INT = 'must be a positive integer';
const FALSE_VALUES = ['false', '0', 'no', 'off'];

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

const required = () => z.string({ required_error: MISSING });

const positiveInt = (fallback: number) =>
  z.coerce
    .number({ invalid_type_error: POSITIVE_INT })
    .int(POSITIVE_INT)
    .positive(POSITIVE_INT)
    .default(fallback);

export const EnvSchema = z.object({
  OPENAI_API_KEY: required(),
  NOTION_TOKEN: required(),
  NOTION_DAILY_DB_ID: required(),
  NOTION_DAILY_TITLE_PROP: z.string().default('Name'),
  OPENAI_BASE_URL: z.string().url('must be a URL').default('https://api.openai.com/v1'),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_TTS_MODEL: z.string().default('gpt-4o-mini-tts'),
  OUTPUT_DIR: z.string().default('public/daily'),
  TZ: z
    .string()
    .refine(isValidTimeZone, 'is not a valid IANA time zone')
    .default(DEFAULT_TIMEZONE),
  NEWS_SINCE_HOURS: positiveInt(24),
  BRIEF_MAX_ITEMS: positiveInt(5),
  BRIEF_READER_NAME: z.string().optional(),
  BRIEF_AUDIENCE: z.string().default('a busy reader'),
  GITHUB_REPO: z.string().optional(),
  GITHUB_REF_NAME: z.string().default('main'),
  AUDIO_OGG: z
    .string()
    .default('true')
    .transform((value) => !FALSE_VALUES.includes(value.toLowerCase())),
  HTTP_TIMEOUT_MS: positiveInt(30000),
});

// 빈 문자열은 설정되지 않은 것으로 본다
function readString(env: EnvReader, key: string): string | undefined {
  const value = env(key)?.trim();
  return value ? value : undefined;
}

function describeIssues(error: z.ZodError, raw: Record<string, string | undefined>): string {
  const missing = error.issues
    .filter((issue) => issue.message === MISSING)
    .map((issue) => String(issue.path[0]));
  if (missing.length > 0) {
    return `Missing required environment variables: ${missing.join(', ')}`;
  }
  const [issue] = error.issues;
  const key = String(issue.path[0]);
  return `${key} ${issue.message}, got "${raw[key]}"`;
}

// 자격 증명 3개는 필수. 하나라도 없으면 네트워크 호출 전에 중단한다.
export function loadBriefConfig(env: EnvReader): BriefConfig {
  const raw = Object.fromEntries(
    Object.keys(EnvSchema.shape).map((key) => [key, readString(env, key)]),
  );
  const result = EnvSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(describeIssues(result.error, raw));
  }
  const vars = result.data;

  const config: BriefConfig = {
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      baseUrl: vars.OPENAI_BASE_URL,
      model: vars.OPENAI_MODEL,
      ttsModel: vars.OPENAI_TTS_MODEL,
    },
    notion: {
      token: vars.NOTION_TOKEN,
      databaseId: vars.NOTION_DAILY_DB_ID,
      titleProperty: vars.NOTION_DAILY_TITLE_PROP,
    },
    outputDir: vars.OUTPUT_DIR,
    timeZone: vars.TZ,
    sinceHours: vars.NEWS_SINCE_HOURS,
    maxItems: vars.BRIEF_MAX_ITEMS,
    readerName: vars.BRIEF_READER_NAME,
    audience: vars.BRIEF_AUDIENCE,
    githubRepo: vars.GITHUB_REPO,
    githubBranch: vars.GITHUB_REF_NAME,
    oggAudio: vars.AUDIO_OGG,
    httpTimeoutMs: vars.HTTP_TIMEOUT_MS,
  };

  return Object.freeze(config);
}

const LOG_LEVELS: LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'];

// LOG_LEVEL 이상인 레벨만 출력
export function logLevelsFrom(level: string | undefined): LogLevel[] {
  const index = LOG_LEVELS.findIndex((candidate) => candidate === level);
  return index === -1 ? LOG_LEVELS.slice(LOG_LEVELS.indexOf('log')) : LOG_LEVELS.slice(index);
}
