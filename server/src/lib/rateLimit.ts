/**
 * 로컬 Express 서버용 고정 윈도우 rate limiter (IP 단위, 프로세스 메모리).
 * Lambda 배포에서는 API Gateway throttling을 사용한다.
 */

import type { NextFunction, Request, Response } from 'express';
import { ENV } from './env';

type Bucket = { count: number; resetAt: number };

const buckets = new Map<string, Bucket>();

function currentBucket(key: string, now: number): Bucket {
  const existing = buckets.get(key);
  if (!existing || existing.resetAt <= now) {
    const bucket = { count: 0, resetAt: now + ENV.RATE_LIMIT_WINDOW_MS };
    buckets.set(key, bucket);
    return bucket;
  }
  return existing;
}

export function rateLimiter(req: Request, res: Response, next: NextFunction): void {
  if (ENV.RATE_LIMIT_MAX <= 0) return next();

  const now = Date.now();
  const bucket = currentBucket(req.ip || 'global', now);
  bucket.count += 1;

  if (bucket.count > ENV.RATE_LIMIT_MAX) {
    const retryAfter = Math.max(0, bucket.resetAt - now);
    res.setHeader('Retry-After', String(Math.ceil(retryAfter / 1000)));
    res.status(429).json({ error: 'rate_limited', message: 'Too many requests. Try again later.' });
    return;
  }

  next();
}
