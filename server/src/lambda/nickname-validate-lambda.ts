/**
 * Lambda 엔트리포인트: GET /nicknames/{nickname}/validate
 * IMPLEMENTATION STATUS: OK (형식 + 예약어 + 사용 가능 여부)
 */

import { validateNicknameController } from '../controllers/user.controller';
import { lambdaHandler, method, pathParameter, resolveIdentity, toErrorResponse, toLambdaResponse } from './http';

export const handler = lambdaHandler('nickname-validate', async (event) => {
  if (method(event) !== 'GET') {
    return toErrorResponse(405, { error: 'method_not_allowed' });
  }

  const result = await validateNicknameController(
    resolveIdentity(event),
    pathParameter(event, 'nickname')
  );
  return toLambdaResponse(result);
});
