// server/src/lib/env.ts
export type AuthMode = 'jwt' | 'claims' | 'header';

export type Env = {
  MOCK: 0 | 1;
  NODE_ENV: string;
  AUTH_MODE: AuthMode;
  AWS_REGION: string;
  USER_TABLE_NAME: string;
  PHOTO_BUCKET_NAME: string;
  PARAMETER_STORE_PREFIX: string;
  MAX_IMAGE_SIZE: number;
  MAX_IMAGE_WIDTH: number;
  MAX_IMAGE_HEIGHT: number;
  IMAGE_JPEG_QUALITY: number;
  ACCESS_URL_TTL_DAYS: number;
  NICKNAME_MIN_LENGTH: number;
  NICKNAME_MAX_LENGTH: number;
  RESERVED_NICKNAMES: string[];
  EXTERNAL_CALL_TIMEOUT_MS: number;
  CONFIG_CACHE_TTL_SEC: number;
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX: number;
};

function pick(...candidates: Array<string | undefined | null>): string {
  for (const c of candidates) if (c && c.trim().length > 0) return c.trim();
  return '';
}

function pickNumber(value: string | undefined | null, fallback: number): number {
  if (value == null) return fallback;
  const trimmed = value.trim();
  if (!trimmed) return fallback;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function pickList(value: string | undefined | null): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function pickAuthMode(value: string | undefined | null): AuthMode {
  const trimmed = (value || '').trim().toLowerCase();
  if (trimmed === 'claims' || trimmed === 'rest') return 'claims';
  if (trimmed === 'header' || trimmed === 'dev') return 'header';
  return 'jwt';
}

export const ENV: Env = {
  MOCK: process.env['MOCK'] === '1' ? 1 : 0,
  NODE_ENV: pick(process.env['NODE_ENV'], 'development'),
  AUTH_MODE: pickAuthMode(process.env['AUTH_MODE']),
  AWS_REGION: pick(process.env['AWS_REGION'], process.env['AWS_DEFAULT_REGION'], 'us-east-1'),
  USER_TABLE_NAME: pick(process.env['USER_TABLE_NAME']),
  PHOTO_BUCKET_NAME: pick(process.env['PHOTO_BUCKET_NAME']),
  PARAMETER_STORE_PREFIX: pick(process.env['PARAMETER_STORE_PREFIX']).replace(/\/+$/, ''),
  MAX_IMAGE_SIZE: pickNumber(process.env['MAX_IMAGE_SIZE'], 5 * 1024 * 1024),
  MAX_IMAGE_WIDTH: pickNumber(process.env['MAX_IMAGE_WIDTH'], 1920),
  MAX_IMAGE_HEIGHT: pickNumber(process.env['MAX_IMAGE_HEIGHT'], 1080),
  IMAGE_JPEG_QUALITY: pickNumber(process.env['IMAGE_JPEG_QUALITY'], 85),
  ACCESS_URL_TTL_DAYS: pickNumber(process.env['ACCESS_URL_TTL_DAYS'], 7),
  NICKNAME_MIN_LENGTH: pickNumber(process.env['NICKNAME_MIN_LENGTH'], 3),
  NICKNAME_MAX_LENGTH: pickNumber(process.env['NICKNAME_MAX_LENGTH'], 20),
  RESERVED_NICKNAMES: pickList(process.env['RESERVED_NICKNAMES']),
  EXTERNAL_CALL_TIMEOUT_MS: pickNumber(process.env['EXTERNAL_CALL_TIMEOUT_MS'], 5000),
  CONFIG_CACHE_TTL_SEC: pickNumber(process.env['CONFIG_CACHE_TTL_SEC'], 0),
  RATE_LIMIT_WINDOW_MS: pickNumber(process.env['RATE_LIMIT_WINDOW_MS'], 60_000),
  RATE_LIMIT_MAX: pickNumber(process.env['RATE_LIMIT_MAX'], 120),
};
