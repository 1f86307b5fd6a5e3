/**
 * Lambda 엔트리포인트: GET /users/{userId}/photo/refresh
 * IMPLEMENTATION STATUS: OK (presigned URL 재발급)
 */

import { refreshPhotoController } from '../controllers/photo.controller';
import { lambdaHandler, method, pathParameter, resolveIdentity, toErrorResponse, toLambdaResponse } from './http';

export const handler = lambdaHandler('photo-refresh', async (event) => {
  if (method(event) !== 'GET') {
    return toErrorResponse(405, { error: 'method_not_allowed' });
  }

  const result = await refreshPhotoController(resolveIdentity(event), pathParameter(event, 'userId'));
  return toLambdaResponse(result);
});
