/**
 * Lambda 엔트리포인트: DELETE /users/{userId}/photo
 * IMPLEMENTATION STATUS: OK
 */

import { deletePhotoController } from '../controllers/photo.controller';
import { lambdaHandler, method, pathParameter, resolveIdentity, toErrorResponse, toLambdaResponse } from './http';

export const handler = lambdaHandler('photo-delete', async (event) => {
  if (method(event) !== 'DELETE') {
    return toErrorResponse(405, { error: 'method_not_allowed' });
  }

  const result = await deletePhotoController(resolveIdentity(event), pathParameter(event, 'userId'));
  return toLambdaResponse(result);
});
