/**
 * Health 컨트롤러: 기본 헬스체크 + 스토리지 모드/설정 요약.
 * IMPLEMENTATION STATUS: OK (외부 서비스 호출 없음)
 */

import { ENV } from '../lib/env';
import { logger } from '../lib/logger';
import { getRuntime } from '../services/runtime';
import { ControllerResult } from './types';

export async function healthCheckController(requestId?: string): Promise<ControllerResult> {
  try {
    logger.info({ reqId: requestId }, 'Health check request received');
    const runtime = await getRuntime();

    const healthData = {
      ok: true,
      time: new Date().toISOString(),
      uptime: process.uptime(),
      version: process.env['npm_package_version'] || '1.0.0',
      environment: ENV.NODE_ENV,
      auth_mode: ENV.AUTH_MODE,
      storage: {
        users: runtime.modes.users,
        assets: runtime.modes.assets,
        table_configured: !!ENV.USER_TABLE_NAME,
        bucket_configured: !!ENV.PHOTO_BUCKET_NAME,
      },
      limits: {
        max_image_bytes: runtime.config.maxImageBytes,
        max_width: runtime.config.maxWidth,
        max_height: runtime.config.maxHeight,
      },
    };

    logger.info({ reqId: requestId, uptime: healthData.uptime }, 'Health check completed');

    return { statusCode: 200, body: healthData };
  } catch (error) {
    logger.error({
      reqId: requestId,
      error: error instanceof Error ? error.message : 'Unknown error',
    }, 'Health check failed');

    return {
      statusCode: 500,
      body: {
        ok: false,
        time: new Date().toISOString(),
        error: 'Health check failed',
      },
    };
  }
}
