/**
 * Express 앱 설정 (로컬 개발/통합 테스트용; 배포는 lambda/* 핸들러)
 */

import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { randomUUID } from 'crypto';
import { ENV } from './lib/env';
import { logger } from './lib/logger';
import { rateLimiter } from './lib/rateLimit';
import healthRoutes from './routes/health.routes';
import nicknameRoutes from './routes/nickname.routes';
import { requestIdOf } from './routes/request';
import userRoutes from './routes/user.routes';
import { getRuntime } from './services/runtime';

const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();
  const reqId = requestIdOf(req) || randomUUID();
  req.headers['x-request-id'] = reqId;
  res.setHeader('X-Request-ID', reqId);

  res.on('finish', () => {
    logger.info(
      {
        reqId,
        method: req.method,
        url: req.originalUrl ?? req.url,
        status: res.statusCode,
        duration: Date.now() - start,
        userAgent: req.get('User-Agent'),
        ip: req.ip,
      },
      'Request completed'
    );
  });

  next();
};

type BodyParsers = { maxBytes: number; json: RequestHandler; raw: RequestHandler };

let bodyParsers: BodyParsers | undefined;

/** JSON carries the image base64-encoded, so its limit is 4/3 of the image size plus room for other fields. */
function bodyParsersFor(maxBytes: number): BodyParsers {
  if (!bodyParsers || bodyParsers.maxBytes !== maxBytes) {
    bodyParsers = {
      maxBytes,
      json: express.json({ limit: Math.ceil((maxBytes * 4) / 3) + 64 * 1024 }),
      raw: express.raw({ type: ['image/*', 'application/octet-stream'], limit: maxBytes + 1 }),
    };
  }
  return bodyParsers;
}

// limits come from the loaded service config, Parameter Store overrides included
const parseBody: RequestHandler = (req, res, next) => {
  if (req.headers['content-length'] === undefined && req.headers['transfer-encoding'] === undefined) {
    next();
    return;
  }
  void getRuntime()
    .then((runtime) => {
      const { json, raw } = bodyParsersFor(runtime.config.maxImageBytes);
      json(req, res, (error?: unknown) => {
        if (error) {
          next(error);
          return;
        }
        raw(req, res, next);
      });
    })
    .catch(next);
};

function bodyParserStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status >= 400 && error.status < 500 ? error.status : undefined;
  }
  return undefined;
}

const app = express();

// 보안 미들웨어
app.use(helmet({
  contentSecurityPolicy: false, // API 서버이므로 CSP 비활성화
  crossOriginEmbedderPolicy: false,
}));

// CORS 설정
const corsOrigins = process.env['CORS_ORIGINS']?.split(',') || ['http://localhost:3000'];
app.use(cors({
  origin: corsOrigins,
  credentials: true,
  methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID', 'X-User-ID', 'X-User-Email'],
}));

// 요청 파싱 미들웨어: JSON(base64 이미지 포함) + raw 이미지 업로드
app.use(parseBody);

// 로깅 미들웨어
app.use(requestLogger);
app.use(rateLimiter);

// API 라우트
app.use('/api/v1/users', userRoutes);
app.use('/api/v1/nicknames', nicknameRoutes);
app.use('/api/v1/health', healthRoutes);
app.use('/health', healthRoutes);

// 루트 경로
app.get('/', (_req: Request, res: Response) => {
  res.json({
    service: 'User Service API',
    version: '1.0.0',
    status: 'running',
    timestamp: new Date().toISOString(),
    endpoints: {
      users: '/api/v1/users',
      nicknames: '/api/v1/nicknames/{nickname}/validate',
      health: '/api/v1/health',
    },
  });
});

// 404 핸들러
app.use('*', (req: Request, res: Response) => {
  res.status(404).json({
    error: 'not_found',
    message: `Route ${req.originalUrl} not found`,
    timestamp: new Date().toISOString(),
  });
});

// 전역 에러 핸들러
app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
  const reqId = requestIdOf(req);

  const status = bodyParserStatus(error);
  if (status !== undefined) {
    logger.warn({ reqId, status, url: req.url }, 'Rejected request body');
    res.status(status).json({
      error: 'invalid_input',
      message: status === 413 ? 'Request body too large' : 'Malformed request body',
      ...(reqId ? { requestId: reqId } : {}),
    });
    return;
  }

  logger.error({
    reqId,
    err: error,
    url: req.url,
    method: req.method,
  }, 'Unhandled error');

  res.status(500).json({
    error: 'internal',
    message: ENV.NODE_ENV === 'development' && error instanceof Error ? error.message : 'Something went wrong',
    timestamp: new Date().toISOString(),
    ...(reqId ? { requestId: reqId } : {}),
  });
});

export default app;
