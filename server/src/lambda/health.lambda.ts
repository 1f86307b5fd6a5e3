/**
 * Lambda 엔트리포인트: GET /health (인증 불필요)
 * IMPLEMENTATION STATUS: OK
 */

import { healthCheckController } from '../controllers/health.controller';
import { header, lambdaHandler, toLambdaResponse } from './http';

export const handler = lambdaHandler('health', async (event) => {
  const result = await healthCheckController(header(event, 'x-request-id') ?? event.requestContext?.requestId);
  return toLambdaResponse(result);
});
