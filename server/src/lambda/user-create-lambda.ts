/**
 * Lambda 엔트리포인트: POST /users
 * IMPLEMENTATION STATUS: OK (JWT claims → identity, JSON body 파싱, CORS 응답)
 */

import { createUserController } from '../controllers/user.controller';
import { lambdaHandler, method, parseJsonBody, resolveIdentity, toErrorResponse, toLambdaResponse } from './http';

export const handler = lambdaHandler('user-create', async (event) => {
  if (method(event) !== 'POST') {
    return toErrorResponse(405, { error: 'method_not_allowed' });
  }

  const result = await createUserController(resolveIdentity(event), parseJsonBody(event));
  return toLambdaResponse(result);
});
