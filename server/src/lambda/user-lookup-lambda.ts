/**
 * Lambda 엔트리포인트: GET /users/by-nickname/{nickname}
 * IMPLEMENTATION STATUS: OK
 */

import { lookupUserController } from '../controllers/user.controller';
import { lambdaHandler, method, pathParameter, resolveIdentity, toErrorResponse, toLambdaResponse } from './http';

export const handler = lambdaHandler('user-lookup', async (event) => {
  if (method(event) !== 'GET') {
    return toErrorResponse(405, { error: 'method_not_allowed' });
  }

  const result = await lookupUserController(
    resolveIdentity(event),
    pathParameter(event, 'nickname')
  );
  return toLambdaResponse(result);
});
