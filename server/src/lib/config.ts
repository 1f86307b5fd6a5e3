/**
 * 서비스 설정 로더: 기본값 → 환경 변수 → SSM Parameter Store 순서로 병합한다.
 * IMPLEMENTATION STATUS:
 * - cold start 당 1회 로드 + node-cache 캐시: OK
 * - SSM 경로(PARAMETER_STORE_PREFIX) 미설정 시 env만 사용: OK
 * - hot reload: 지원하지 않음 (컨테이너 재시작 시 갱신)
 */

import { GetParametersByPathCommand, type SSMClient } from '@aws-sdk/client-ssm';
import { z } from 'zod';
import defaultReservedNicknames from '../data/reserved-nicknames.json';
import type { ServiceConfig } from '../types/user';
import { getSsmClient } from './aws';
import { cached, invalidate } from './cache';
import { ENV } from './env';
import { liveOrMock } from './liveOrMock';
import { logger } from './logger';

const CONFIG_CACHE_KEY = 'service-config';

/** Parameter names relative to the prefix, e.g. `/user-service/dev/max-image-size`. */
const PARAMETER_KEYS = {
  'max-image-size': 'maxImageBytes',
  'max-width': 'maxWidth',
  'max-height': 'maxHeight',
  'image-jpeg-quality': 'jpegQuality',
  'access-url-ttl-days': 'accessUrlTtlDays',
  'nickname-min-length': 'nicknameMinLen',
  'nickname-max-length': 'nicknameMaxLen',
  'external-call-timeout-ms': 'externalCallTimeoutMs',
} as const satisfies Record<string, keyof ServiceConfig>;

export const ServiceConfigSchema = z
  .object({
    maxImageBytes: z.number().int().positive(),
    maxWidth: z.number().int().positive(),
    maxHeight: z.number().int().positive(),
    jpegQuality: z.number().int().min(1).max(100),
    accessUrlTtlDays: z.number().positive().max(7),
    nicknameMinLen: z.number().int().min(1),
    nicknameMaxLen: z.number().int().min(1),
    reservedNicknames: z.array(z.string().min(1)),
    externalCallTimeoutMs: z.number().int().nonnegative(),
  })
  .refine((config) => config.nicknameMinLen <= config.nicknameMaxLen, {
    message: 'nicknameMinLen must not exceed nicknameMaxLen',
  });

export type ParameterFetcher = (prefix: string) => Promise<Record<string, string>>;

export function configFromEnv(env = ENV): ServiceConfig {
  return {
    maxImageBytes: env.MAX_IMAGE_SIZE,
    maxWidth: env.MAX_IMAGE_WIDTH,
    maxHeight: env.MAX_IMAGE_HEIGHT,
    jpegQuality: env.IMAGE_JPEG_QUALITY,
    accessUrlTtlDays: env.ACCESS_URL_TTL_DAYS,
    nicknameMinLen: env.NICKNAME_MIN_LENGTH,
    nicknameMaxLen: env.NICKNAME_MAX_LENGTH,
    reservedNicknames: env.RESERVED_NICKNAMES.length > 0 ? env.RESERVED_NICKNAMES : defaultReservedNicknames,
    externalCallTimeoutMs: env.EXTERNAL_CALL_TIMEOUT_MS,
  };
}

/**
 * Overlays Parameter Store values onto `base`. Unknown names are ignored and
 * non-numeric values for numeric settings keep the base value.
 */
export function applyParameters(base: ServiceConfig, parameters: Record<string, string>): ServiceConfig {
  const next: ServiceConfig = { ...base, reservedNicknames: [...base.reservedNicknames] };

  for (const [name, key] of Object.entries(PARAMETER_KEYS)) {
    const raw = parameters[name];
    if (raw === undefined || raw.trim() === '') continue;
    const parsed = Number(raw.trim());
    if (Number.isFinite(parsed)) {
      next[key] = parsed;
    } else {
      logger.warn({ parameter: name, value: raw }, 'Ignoring non-numeric config parameter');
    }
  }

  const reserved = parameters['reserved-nicknames'];
  if (reserved && reserved.trim()) {
    next.reservedNicknames = reserved
      .split(',')
      .map((word) => word.trim())
      .filter((word) => word.length > 0);
  }

  return next;
}

export function ssmParameterFetcher(client: SSMClient = getSsmClient()): ParameterFetcher {
  return async (prefix: string) => {
    const values: Record<string, string> = {};
    let nextToken: string | undefined;

    do {
      const page = await client.send(
        new GetParametersByPathCommand({
          Path: prefix,
          Recursive: false,
          WithDecryption: true,
          NextToken: nextToken,
        })
      );
      for (const parameter of page.Parameters ?? []) {
        if (!parameter.Name || parameter.Value === undefined) continue;
        const name = parameter.Name.slice(prefix.length).replace(/^\/+/, '');
        values[name] = parameter.Value;
      }
      nextToken = page.NextToken;
    } while (nextToken);

    return values;
  };
}

export type LoadConfigOptions = {
  env?: typeof ENV;
  fetchParameters?: ParameterFetcher;
};

/** Builds and validates the config without touching the cache. */
export async function buildServiceConfig(options: LoadConfigOptions = {}): Promise<ServiceConfig> {
  const env = options.env ?? ENV;
  let config = configFromEnv(env);

  const fetchParameters =
    options.fetchParameters ?? (liveOrMock('ssm') === 'live' ? ssmParameterFetcher() : undefined);

  if (fetchParameters && env.PARAMETER_STORE_PREFIX) {
    try {
      const parameters = await fetchParameters(env.PARAMETER_STORE_PREFIX);
      config = applyParameters(config, parameters);
      logger.info(
        { prefix: env.PARAMETER_STORE_PREFIX, count: Object.keys(parameters).length },
        'Loaded service parameters'
      );
    } catch (error) {
      logger.warn(
        { prefix: env.PARAMETER_STORE_PREFIX, error: error instanceof Error ? error.message : error },
        'Parameter Store read failed; using environment configuration'
      );
    }
  }

  return ServiceConfigSchema.parse(config);
}

export async function loadServiceConfig(options: LoadConfigOptions = {}): Promise<ServiceConfig> {
  return cached(CONFIG_CACHE_KEY, () => buildServiceConfig(options));
}

export function resetServiceConfig(): void {
  invalidate(CONFIG_CACHE_KEY);
}
