/**
 * 공통 컨트롤러 응답 타입 (Express/Lambda 겸용) + ServiceError → HTTP 응답 매핑.
 * IMPLEMENTATION STATUS: OK
 */

import { isServiceError, type ErrorKind, type ServiceError } from '../lib/errors';
import { logger } from '../lib/logger';

export type ControllerResult<T = unknown> = {
  statusCode: number;
  body: T;
  headers?: Record<string, string>;
};

export type ErrorBody = {
  error: ErrorKind;
  message: string;
  reason?: string;
  usage?: string;
  category?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
};

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  invalid_input: 400,
  unauthorized: 401,
  forbidden: 403,
  not_found: 404,
  conflict: 409,
  internal: 500,
};

export function errorResult(error: ServiceError): ControllerResult<ErrorBody> {
  const statusCode = error.reason === 'timeout' ? 503 : STATUS_BY_KIND[error.kind];
  const body: ErrorBody = { error: error.kind, message: error.message };
  if (error.reason) body.reason = error.reason;
  if (error.usage) body.usage = error.usage;
  if (error.category) body.category = error.category;
  if (error.kind === 'internal') body.retryable = error.retryable;
  if (error.details) body.details = error.details;
  return { statusCode, body };
}

export function unauthorizedResult(): ControllerResult<ErrorBody> {
  return {
    statusCode: 401,
    body: { error: 'unauthorized', message: 'Invalid authentication context' },
  };
}

/** Maps ServiceError to a response; anything else bubbles to the transport's 500 handler. */
export async function handleServiceErrors(
  work: () => Promise<ControllerResult>,
  onError?: (error: ServiceError) => void
): Promise<ControllerResult> {
  try {
    return await work();
  } catch (error) {
    if (isServiceError(error)) {
      onError?.(error);
      return errorResult(error);
    }
    throw error;
  }
}

export function logServiceError(action: string) {
  return (error: ServiceError): void => {
    const level = error.kind === 'internal' ? 'error' : 'warn';
    logger[level]({ action, kind: error.kind, reason: error.reason, details: error.details }, error.message);
  };
}
