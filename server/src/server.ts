/**
 * 서버 시작점 (로컬 개발용 Express)
 */

import 'dotenv/config';
import app from './app';
import { closeClients } from './lib/aws';
import { logger } from './lib/logger';
import { ENV } from './lib/env';
import { liveOrMock, AdapterName } from './lib/liveOrMock';

const PORT = Number(process.env['PORT'] ?? 8787);
const shouldStart = !process.env['JEST_WORKER_ID'];

type AdapterConfig = {
  adapter: AdapterName;
  envVars: string[];
  configured: boolean;
};

const adapters: AdapterConfig[] = [
  { adapter: 'dynamodb', envVars: ['USER_TABLE_NAME'], configured: !!ENV.USER_TABLE_NAME },
  { adapter: 's3', envVars: ['PHOTO_BUCKET_NAME'], configured: !!ENV.PHOTO_BUCKET_NAME },
  { adapter: 'ssm', envVars: ['PARAMETER_STORE_PREFIX'], configured: !!ENV.PARAMETER_STORE_PREFIX },
];

if (shouldStart) {
  logger.info({ mock: ENV.MOCK, authMode: ENV.AUTH_MODE }, `Booting server with MOCK=${ENV.MOCK}`);

  adapters.forEach(({ adapter, envVars, configured }) => {
    const mode = liveOrMock(adapter);
    const label = adapter.toUpperCase();

    if (!configured) {
      logger.warn({ adapter, envVars, mode }, `${label} not configured; using in-memory mock.`);
      return;
    }

    if (mode === 'mock') {
      logger.info({ adapter, mode }, `${label} forced to mock (MOCK=${ENV.MOCK}).`);
    } else {
      logger.info({ adapter, mode }, `${label} running live.`);
    }
  });
}

let server: ReturnType<typeof app.listen> | undefined;

if (shouldStart) {
  server = app.listen(PORT, () => {
    logger.info(
      {
        port: PORT,
        environment: ENV.NODE_ENV,
        nodeVersion: process.version,
        pid: process.pid,
      },
      'Server started successfully'
    );
  });
}

// Graceful shutdown
const gracefulShutdown = (signal: string) => {
  logger.info({ signal }, 'Received shutdown signal');

  server?.close(() => {
    closeClients();
    logger.info('Server closed successfully');
    process.exit(0);
  });

  // 강제 종료 타임아웃
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

if (shouldStart) {
  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
    process.exit(1);
  });
}

export default server;
