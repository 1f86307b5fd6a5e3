import pino, { type Logger, type LoggerOptions } from 'pino';

const enablePretty =
  process.env['LOG_PRETTY'] === '1' ||
  (process.env['NODE_ENV'] !== 'production' &&
    process.env['NODE_ENV'] !== 'test' &&
    process.stdout.isTTY);

const baseOptions: LoggerOptions = {
  level: process.env['LOG_LEVEL'] || 'info',
  base: { service: process.env['SERVICE_NAME'] || 'user-service' },
  redact: {
    paths: ['headers.authorization', 'headers.Authorization', 'event.headers.authorization'],
    censor: '[redacted]',
  },
};

let logger: Logger;

if (enablePretty) {
  try {
    logger = pino({
      ...baseOptions,
      transport: {
        // optional dependency; may not be installed
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          singleLine: false,
        },
      },
    });
  } catch {
    // pino-pretty could not be resolved
    logger = pino(baseOptions);
  }
} else {
  logger = pino(baseOptions);
}

export type { Logger };
export { logger };
