/**
 * User record persistence contract.
 * IMPLEMENTATION STATUS:
 * - DynamoDB implementation (conditional writes / transactions): dynamo-user.repository.ts
 * - In-memory implementation for MOCK=1 and tests: memory-user.repository.ts
 */

import type { ImageRef, UserRecord } from '../types/user';

export type RecordStoreErrorCode = 'already_exists' | 'nickname_taken' | 'not_found';

export class RecordStoreError extends Error {
  readonly code: RecordStoreErrorCode;
  readonly identity: string;

  constructor(code: RecordStoreErrorCode, identity: string, message: string) {
    super(message);
    this.name = 'RecordStoreError';
    this.code = code;
    this.identity = identity;
  }
}

export interface UserRepository {
  get(identity: string): Promise<UserRecord | undefined>;
  /** Case-insensitive. */
  getByNickname(nickname: string): Promise<UserRecord | undefined>;
  /**
   * Atomically claims both the identity and the nickname.
   * Rejects with `already_exists` before `nickname_taken` when both conflict.
   */
  createIfAbsent(identity: string, nickname: string): Promise<UserRecord>;
  /** `null` clears the current photo. */
  setImageUrl(identity: string, image: ImageRef | null): Promise<UserRecord>;
  delete(identity: string): Promise<UserRecord>;
}

export function normalizeNickname(nickname: string): string {
  return nickname.trim().toLowerCase();
}
