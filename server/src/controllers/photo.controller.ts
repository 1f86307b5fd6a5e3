/**
 * Photo 컨트롤러: 업로드(정규화 + 교체) / 삭제 / URL 갱신.
 * IMPLEMENTATION STATUS: OK (JSON base64 또는 raw binary body 지원)
 */

import { z } from 'zod';
import { logger } from '../lib/logger';
import { getUserService } from '../services/runtime';
import type { RequestIdentity } from '../types/user';
import { ControllerResult, handleServiceErrors, logServiceError, unauthorizedResult } from './types';

const UPLOAD_USAGE = 'POST /users/{userId}/photo with {"image": "<base64 or data URL>", "nickname": "optional"}';

const UploadSchema = z.object({
  image: z.string({ required_error: 'No image data in request body' }).min(1, 'No image data in request body'),
  nickname: z.string().trim().min(1).optional(),
});

export type PhotoUploadRequest = {
  userId?: string;
  /** Parsed JSON body: `{ image, nickname? }`. */
  body?: unknown;
  /** Binary body, when the transport received the image bytes directly. */
  raw?: Buffer;
};

/** Accepts plain base64 or a `data:image/...;base64,` URL. */
export function decodeImagePayload(image: string): Buffer {
  const comma = image.indexOf(',');
  const encoded = image.startsWith('data:') && comma >= 0 ? image.slice(comma + 1) : image;
  return Buffer.from(encoded.replace(/\s+/g, ''), 'base64');
}

function badRequest(message: string): ControllerResult {
  return { statusCode: 400, body: { error: 'invalid_input', message, usage: UPLOAD_USAGE } };
}

export async function uploadPhotoController(
  auth: RequestIdentity | undefined,
  request: PhotoUploadRequest
): Promise<ControllerResult> {
  if (!auth) return unauthorizedResult();

  let image: Buffer;
  let nickname: string | undefined;

  if (request.raw && request.raw.length > 0) {
    image = request.raw;
  } else {
    if (request.body === undefined) return badRequest('No image data provided');
    const parse = UploadSchema.safeParse(request.body);
    if (!parse.success) {
      logger.warn({ issues: parse.error.issues }, 'Invalid photo upload payload');
      return badRequest(parse.error.issues[0]?.message ?? 'Invalid request body');
    }
    image = decodeImagePayload(parse.data.image);
    nickname = parse.data.nickname;
  }

  if (image.length === 0) return badRequest('Image data is empty or not valid base64');

  return handleServiceErrors(async () => {
    const service = await getUserService();
    const result = await service.attachPhoto({
      identity: request.userId?.trim() || auth.identity,
      requestingIdentity: auth.identity,
      image,
      ...(nickname ? { nicknameForNewUser: nickname } : {}),
    });
    return {
      statusCode: 200,
      body: {
        message: 'Photo uploaded successfully',
        photo_url: result.photo.url,
        size_reduction: `${result.photo.reduction_percent.toFixed(1)}%`,
        ...result,
      },
    };
  }, logServiceError('upload_photo'));
}

export async function deletePhotoController(
  auth: RequestIdentity | undefined,
  userId: string | undefined
): Promise<ControllerResult> {
  if (!auth) return unauthorizedResult();

  return handleServiceErrors(async () => {
    const service = await getUserService();
    const result = await service.deletePhoto(userId?.trim() || auth.identity, auth.identity);
    let message = 'No photos to delete';
    if (result.failed_assets.length > 0) message = 'Photo removed; some stored files could not be deleted';
    else if (result.removed_assets.length > 0) message = 'Photos deleted successfully';
    return { statusCode: 200, body: { message, ...result, deleted_at: new Date().toISOString() } };
  }, logServiceError('delete_photo'));
}

export async function refreshPhotoController(
  auth: RequestIdentity | undefined,
  userId: string | undefined
): Promise<ControllerResult> {
  if (!auth) return unauthorizedResult();

  return handleServiceErrors(async () => {
    const service = await getUserService();
    const result = await service.refreshPhotoUrl(userId?.trim() || auth.identity, auth.identity);
    return {
      statusCode: 200,
      body: { message: 'Photo URL refreshed successfully', ...result, refreshed_at: new Date().toISOString() },
    };
  }, logServiceError('refresh_photo'));
}
