/**
 * 인증 컨텍스트 추출: API Gateway가 JWT 검증을 마친 뒤 전달하는 클레임에서 identity(sub)를 꺼낸다.
 * IMPLEMENTATION STATUS:
 * - HTTP API JWT authorizer (requestContext.authorizer.jwt.claims): OK
 * - REST API Cognito authorizer (requestContext.authorizer.claims): OK
 * - 로컬 개발용 x-user-id 헤더: OK (AUTH_MODE=header, production에서는 사용 금지)
 * 토큰 자체는 여기서 다시 검증하지 않는다.
 */

import { z } from 'zod';
import type { RequestIdentity } from '../types/user';
import { ENV, type AuthMode } from './env';
import { logger } from './logger';

export type AuthSource = {
  requestContext?: unknown;
  headers?: Record<string, string | string[] | undefined>;
};

export interface AuthContextProvider {
  readonly mode: AuthMode;
  resolve(source: AuthSource): RequestIdentity | undefined;
}

const ClaimsSchema = z.record(z.unknown());

const JwtContextSchema = z.object({
  authorizer: z.object({ jwt: z.object({ claims: ClaimsSchema }) }),
});

const ClaimsContextSchema = z.object({
  authorizer: z.object({ claims: ClaimsSchema }),
});

function toClaimMap(raw: Record<string, unknown>): Record<string, string> {
  const claims: Record<string, string> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === 'string') claims[name] = value;
    else if (typeof value === 'number' || typeof value === 'boolean') claims[name] = String(value);
    else if (Array.isArray(value)) claims[name] = value.map(String).join(',');
  }
  return claims;
}

function fromClaims(raw: Record<string, unknown>): RequestIdentity | undefined {
  const claims = toClaimMap(raw);
  const identity = claims['sub']?.trim();
  if (!identity) return undefined;
  return { identity, claims };
}

function headerValue(headers: AuthSource['headers'], name: string): string | undefined {
  if (!headers) return undefined;
  const match = Object.entries(headers).find(([key]) => key.toLowerCase() === name);
  const value = match?.[1];
  return Array.isArray(value) ? value[0] : value;
}

export const jwtAuthorizerProvider: AuthContextProvider = {
  mode: 'jwt',
  resolve(source) {
    const parsed = JwtContextSchema.safeParse(source.requestContext);
    return parsed.success ? fromClaims(parsed.data.authorizer.jwt.claims) : undefined;
  },
};

export const claimsAuthorizerProvider: AuthContextProvider = {
  mode: 'claims',
  resolve(source) {
    const parsed = ClaimsContextSchema.safeParse(source.requestContext);
    return parsed.success ? fromClaims(parsed.data.authorizer.claims) : undefined;
  },
};

export const headerProvider: AuthContextProvider = {
  mode: 'header',
  resolve(source) {
    const identity = headerValue(source.headers, 'x-user-id')?.trim();
    if (!identity) return undefined;
    const claims: Record<string, string> = { sub: identity };
    const email = headerValue(source.headers, 'x-user-email');
    if (email) claims['email'] = email;
    return { identity, claims };
  },
};

export function createAuthProvider(mode: AuthMode): AuthContextProvider {
  switch (mode) {
    case 'jwt':
      return jwtAuthorizerProvider;
    case 'claims':
      return claimsAuthorizerProvider;
    case 'header':
      return headerProvider;
  }
}

let provider: AuthContextProvider | null = null;

/** Chosen once per cold start from AUTH_MODE. */
export function getAuthProvider(): AuthContextProvider {
  if (provider) return provider;

  if (ENV.AUTH_MODE === 'header' && ENV.NODE_ENV === 'production') {
    logger.warn('AUTH_MODE=header is not allowed in production; using jwt authorizer claims');
    provider = jwtAuthorizerProvider;
  } else {
    provider = createAuthProvider(ENV.AUTH_MODE);
  }
  logger.info({ mode: provider.mode }, 'Auth context provider selected');
  return provider;
}
