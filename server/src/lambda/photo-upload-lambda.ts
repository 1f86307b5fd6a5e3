/**
 * Lambda 엔트리포인트: POST /users/{userId}/photo
 * IMPLEMENTATION STATUS: OK
 * - JSON body {"image": base64 | data URL, "nickname"?} 지원
 * - image/* Content-Type + isBase64Encoded binary body 지원
 */

import { uploadPhotoController } from '../controllers/photo.controller';
import {
  bodyBuffer,
  header,
  lambdaHandler,
  method,
  parseJsonBody,
  pathParameter,
  resolveIdentity,
  toErrorResponse,
  toLambdaResponse,
} from './http';

export const handler = lambdaHandler('photo-upload', async (event) => {
  if (method(event) !== 'POST') {
    return toErrorResponse(405, { error: 'method_not_allowed' });
  }

  const contentType = (header(event, 'content-type') ?? '').toLowerCase();
  const binary = contentType.startsWith('image/') || contentType === 'application/octet-stream';

  const result = await uploadPhotoController(resolveIdentity(event), {
    userId: pathParameter(event, 'userId'),
    ...(binary ? { raw: bodyBuffer(event) } : { body: parseJsonBody(event) }),
  });
  return toLambdaResponse(result);
});
