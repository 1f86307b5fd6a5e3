/**
 * Lambda 공통 HTTP 헬퍼: CORS 헤더 + 컨트롤러 응답 변환 + 인증 컨텍스트/바디 파싱.
 * IMPLEMENTATION STATUS: OK (HTTP API payload v2 proxy 통합용)
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import type { ControllerResult } from '../controllers/types';
import { getAuthProvider } from '../lib/auth';
import { logger } from '../lib/logger';
import type { RequestIdentity } from '../types/user';

const defaultHeaders = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization,X-Request-ID,X-Amz-Date,X-Api-Key,X-Amz-Security-Token',
  'Access-Control-Allow-Methods': 'GET,POST,DELETE,OPTIONS',
};

export type LambdaHandler = (event: APIGatewayProxyEventV2) => Promise<APIGatewayProxyResultV2>;

export function withCors(headers?: Record<string, string>): Record<string, string> {
  return { ...defaultHeaders, ...(headers ?? {}) };
}

export function toLambdaResponse(result: ControllerResult): APIGatewayProxyResultV2 {
  return {
    statusCode: result.statusCode,
    headers: withCors(result.headers),
    body: JSON.stringify(result.body),
  };
}

export function toErrorResponse(
  statusCode = 500,
  body: Record<string, unknown> = {
    error: 'internal',
    message: 'Unexpected error in Lambda handler',
  }
): APIGatewayProxyResultV2 {
  return {
    statusCode,
    headers: withCors(),
    body: JSON.stringify(body),
  };
}

export function method(event: APIGatewayProxyEventV2): string {
  return (event.requestContext?.http?.method ?? '').toUpperCase();
}

export function isOptions(event: APIGatewayProxyEventV2): boolean {
  return method(event) === 'OPTIONS';
}

export function header(event: APIGatewayProxyEventV2, name: string): string | undefined {
  const wanted = name.toLowerCase();
  const match = Object.entries(event.headers ?? {}).find(([key]) => key.toLowerCase() === wanted);
  return match?.[1];
}

/** URL-decoded path parameter; a malformed escape is passed through as-is for validation to reject. */
export function pathParameter(event: APIGatewayProxyEventV2, name: string): string | undefined {
  const value = event.pathParameters?.[name];
  if (value === undefined) return undefined;
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

export function resolveIdentity(event: APIGatewayProxyEventV2): RequestIdentity | undefined {
  return getAuthProvider().resolve({ requestContext: event.requestContext, headers: event.headers });
}

export function bodyBuffer(event: APIGatewayProxyEventV2): Buffer | undefined {
  if (!event.body) return undefined;
  return event.isBase64Encoded ? Buffer.from(event.body, 'base64') : Buffer.from(event.body, 'utf8');
}

export function parseJsonBody(event: APIGatewayProxyEventV2): unknown {
  const raw = bodyBuffer(event);
  if (!raw) return undefined;
  try {
    const parsed: unknown = JSON.parse(raw.toString('utf8'));
    return parsed;
  } catch {
    return undefined;
  }
}

/**
 * OPTIONS 처리 + 예외 로깅을 공통화한다. `name`은 로그용 Lambda 이름.
 */
export function lambdaHandler(name: string, run: LambdaHandler): LambdaHandler {
  return async (event) => {
    if (isOptions(event)) {
      return { statusCode: 200, headers: withCors(), body: '' };
    }

    try {
      return await run(event);
    } catch (error) {
      logger.error(
        { err: error, routeKey: event.routeKey, requestId: event.requestContext?.requestId },
        `Error in ${name} Lambda`
      );
      return toErrorResponse();
    }
  };
}
