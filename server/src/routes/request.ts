/**
 * Express 요청 → 컨트롤러 입력 변환 헬퍼 (인증 컨텍스트, query string, 응답 전송).
 */

import type { Request, Response } from 'express';
import type { ControllerResult } from '../controllers/types';
import { getAuthProvider } from '../lib/auth';
import type { RequestIdentity } from '../types/user';

export function identityOf(req: Request): RequestIdentity | undefined {
  return getAuthProvider().resolve({ headers: req.headers });
}

/** First value of a query parameter; nested or array values collapse to their first string. */
export function queryString(req: Request, name: string): string | undefined {
  const value: unknown = req.query[name];
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === 'string' ? first : undefined;
  }
  return undefined;
}

export function requestIdOf(req: Request): string | undefined {
  const value = req.headers['x-request-id'];
  return Array.isArray(value) ? value[0] : value;
}

export function send(res: Response, result: ControllerResult): void {
  if (result.headers) res.set(result.headers);
  res.status(result.statusCode).json(result.body);
}
