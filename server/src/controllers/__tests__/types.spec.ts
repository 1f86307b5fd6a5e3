import { ServiceError } from '../../lib/errors';
import { decodeImagePayload } from '../photo.controller';
import { errorResult, handleServiceErrors } from '../types';

describe('errorResult', () => {
  it.each([
    ['invalid_input', 400],
    ['forbidden', 403],
    ['not_found', 404],
    ['conflict', 409],
    ['internal', 500],
  ] as const)('maps %s to %i', (kind, status) => {
    expect(errorResult(new ServiceError(kind, 'boom')).statusCode).toBe(status);
  });

  it('reports timeouts as retryable 503s', () => {
    const error = new ServiceError('internal', 'Timed out after 50ms: users.get', {
      reason: 'timeout',
      retryable: true,
      category: 'correctness',
      details: { operation: 'users.get', timeout_ms: 50 },
    });

    expect(errorResult(error)).toEqual({
      statusCode: 503,
      body: {
        error: 'internal',
        message: 'Timed out after 50ms: users.get',
        reason: 'timeout',
        category: 'correctness',
        retryable: true,
        details: { operation: 'users.get', timeout_ms: 50 },
      },
    });
  });

  it('carries usage hints for invalid input', () => {
    const error = ServiceError.invalidInput('Account deletion requires confirmation', {
      reason: 'confirmation_required',
      usage: 'DELETE /users/{userId}?confirm=true',
    });

    expect(errorResult(error).body).toEqual({
      error: 'invalid_input',
      message: 'Account deletion requires confirmation',
      reason: 'confirmation_required',
      usage: 'DELETE /users/{userId}?confirm=true',
    });
  });
});

describe('handleServiceErrors', () => {
  it('converts service errors and rethrows anything else', async () => {
    const onError = jest.fn();

    const result = await handleServiceErrors(async () => {
      throw ServiceError.notFound('User not found');
    }, onError);

    expect(result.statusCode).toBe(404);
    expect(onError).toHaveBeenCalledTimes(1);
    await expect(
      handleServiceErrors(async () => {
        throw new Error('socket hang up');
      })
    ).rejects.toThrow('socket hang up');
  });
});

describe('decodeImagePayload', () => {
  it('accepts plain base64 and data URLs', () => {
    expect(decodeImagePayload('aGVsbG8=').toString()).toBe('hello');
    expect(decodeImagePayload('data:image/png;base64,aGVs\nbG8=').toString()).toBe('hello');
  });
});
