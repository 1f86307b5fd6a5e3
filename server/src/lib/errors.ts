export type ErrorKind =
  | 'invalid_input'
  | 'unauthorized'
  | 'forbidden'
  | 'not_found'
  | 'conflict'
  | 'internal';

export type ErrorReason =
  | 'user_exists'
  | 'nickname_taken'
  | 'invalid_format'
  | 'reserved'
  | 'too_large'
  | 'unsupported_format'
  | 'confirmation_required'
  | 'timeout';

/**
 * correctness: the request did not take effect (or left state that needs manual cleanup).
 * cleanup: the request took effect; only best-effort housekeeping failed.
 */
export type ErrorCategory = 'correctness' | 'cleanup';

export type ServiceErrorOptions = {
  reason?: ErrorReason;
  usage?: string;
  details?: Record<string, unknown>;
  category?: ErrorCategory;
  retryable?: boolean;
  cause?: unknown;
};

export class ServiceError extends Error {
  readonly kind: ErrorKind;
  readonly reason?: ErrorReason;
  readonly usage?: string;
  readonly details?: Record<string, unknown>;
  readonly category?: ErrorCategory;
  readonly retryable: boolean;

  constructor(kind: ErrorKind, message: string, options: ServiceErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ServiceError';
    this.kind = kind;
    this.retryable = options.retryable ?? false;
    if (options.reason !== undefined) this.reason = options.reason;
    if (options.usage !== undefined) this.usage = options.usage;
    if (options.details !== undefined) this.details = options.details;
    if (options.category !== undefined) this.category = options.category;
  }

  static invalidInput(message: string, options: ServiceErrorOptions = {}): ServiceError {
    return new ServiceError('invalid_input', message, options);
  }

  static notFound(message: string, details?: Record<string, unknown>): ServiceError {
    return new ServiceError('not_found', message, details ? { details } : {});
  }

  static forbidden(message: string, details?: Record<string, unknown>): ServiceError {
    return new ServiceError('forbidden', message, details ? { details } : {});
  }

  static internal(operation: string, cause: unknown, options: ServiceErrorOptions = {}): ServiceError {
    return new ServiceError('internal', `External call failed: ${operation}`, {
      category: 'correctness',
      retryable: true,
      ...options,
      details: { operation, cause: describeError(cause), ...(options.details ?? {}) },
      cause,
    });
  }
}

export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
