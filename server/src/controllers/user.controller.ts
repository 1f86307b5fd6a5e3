/**
 * User 컨트롤러: 생성 / 닉네임 조회 / 삭제 / 닉네임 검증 (Express와 Lambda에서 재사용).
 * IMPLEMENTATION STATUS: OK (zod validation + UserService + ServiceError 매핑)
 */

import { z } from 'zod';
import { logger } from '../lib/logger';
import { getUserService } from '../services/runtime';
import type { RequestIdentity } from '../types/user';
import { ControllerResult, handleServiceErrors, logServiceError, unauthorizedResult } from './types';

const CREATE_USAGE = 'POST /users with {"nickname": "your_nickname"}';

const CreateUserSchema = z.object({
  nickname: z.string({ required_error: 'Nickname is required' }).trim().min(1, 'Nickname is required'),
});

const NicknameParamSchema = z.string().trim().min(1, 'Nickname path parameter is required');

const DeleteUserSchema = z.object({
  userId: z.string().trim().min(1).optional(),
  confirm: z.string().optional(),
  reason: z.string().trim().max(500).optional(),
});

export type DeleteUserRequest = z.input<typeof DeleteUserSchema>;

export async function createUserController(
  auth: RequestIdentity | undefined,
  payload: unknown
): Promise<ControllerResult> {
  if (!auth) return unauthorizedResult();

  const parse = CreateUserSchema.safeParse(payload ?? {});
  if (!parse.success) {
    logger.warn({ issues: parse.error.issues }, 'Invalid create user payload');
    return {
      statusCode: 400,
      body: {
        error: 'invalid_input',
        message: parse.error.issues[0]?.message ?? 'Invalid request body',
        usage: CREATE_USAGE,
      },
    };
  }

  return handleServiceErrors(async () => {
    const service = await getUserService();
    const user = await service.createUser(auth.identity, parse.data.nickname);
    return { statusCode: 201, body: { message: 'User created successfully', user } };
  }, logServiceError('create_user'));
}

export async function lookupUserController(
  auth: RequestIdentity | undefined,
  nickname: unknown
): Promise<ControllerResult> {
  if (!auth) return unauthorizedResult();

  const parse = NicknameParamSchema.safeParse(nickname);
  if (!parse.success) {
    return {
      statusCode: 400,
      body: {
        error: 'invalid_input',
        message: 'Nickname path parameter is required',
        usage: 'GET /users/by-nickname/{nickname}',
      },
    };
  }

  return handleServiceErrors(async () => {
    const service = await getUserService();
    const user = await service.lookupByNickname(parse.data);
    return { statusCode: 200, body: { user, retrieved_at: new Date().toISOString() } };
  }, logServiceError('lookup_user'));
}

export async function deleteUserController(
  auth: RequestIdentity | undefined,
  request: DeleteUserRequest
): Promise<ControllerResult> {
  if (!auth) return unauthorizedResult();

  const parse = DeleteUserSchema.safeParse(request);
  if (!parse.success) {
    return {
      statusCode: 400,
      body: { error: 'invalid_input', message: 'Invalid delete request', details: { issues: parse.error.issues } },
    };
  }

  const { userId, confirm, reason } = parse.data;
  return handleServiceErrors(async () => {
    const service = await getUserService();
    const result = await service.deleteUser({
      identity: userId ?? auth.identity,
      requestingIdentity: auth.identity,
      confirm: confirm?.trim().toLowerCase() === 'true',
      ...(reason ? { reason } : {}),
    });
    return {
      statusCode: 200,
      body: {
        message: 'User account deleted successfully',
        ...result,
        deleted_at: new Date().toISOString(),
      },
    };
  }, logServiceError('delete_user'));
}

export async function validateNicknameController(
  auth: RequestIdentity | undefined,
  nickname: unknown
): Promise<ControllerResult> {
  if (!auth) return unauthorizedResult();

  const parse = NicknameParamSchema.safeParse(nickname);
  if (!parse.success) {
    return {
      statusCode: 400,
      body: {
        error: 'invalid_input',
        message: 'Nickname is required in path: /nicknames/{nickname}/validate',
      },
    };
  }

  return handleServiceErrors(async () => {
    const service = await getUserService();
    const result = await service.checkNickname(parse.data);
    return { statusCode: 200, body: { ...result, requested_by: auth.identity } };
  }, logServiceError('validate_nickname'));
}
