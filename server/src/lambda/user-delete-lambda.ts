/**
 * Lambda 엔트리포인트: DELETE /users/{userId}?confirm=true
 * IMPLEMENTATION STATUS: OK
 * - 삭제 사유는 ?reason= 또는 JSON body {"reason": "..."} 둘 다 허용 (query 우선)
 */

import { z } from 'zod';
import { deleteUserController } from '../controllers/user.controller';
import { lambdaHandler, method, parseJsonBody, pathParameter, resolveIdentity, toErrorResponse, toLambdaResponse } from './http';

const ReasonBodySchema = z.object({ reason: z.string() });

export const handler = lambdaHandler('user-delete', async (event) => {
  if (method(event) !== 'DELETE') {
    return toErrorResponse(405, { error: 'method_not_allowed' });
  }

  const query = event.queryStringParameters ?? {};
  const body = ReasonBodySchema.safeParse(parseJsonBody(event));
  const reason = query['reason'] ?? (body.success ? body.data.reason : undefined);

  const result = await deleteUserController(resolveIdentity(event), {
    userId: pathParameter(event, 'userId'),
    confirm: query['confirm'],
    reason,
  });
  return toLambdaResponse(result);
});
