/**
 * In-memory UserRepository (MOCK=1 / tests).
 * Each operation runs synchronously between awaits, so the identity and
 * nickname checks are atomic with the write just like the DynamoDB transaction.
 */

import type { ImageRef, UserRecord } from '../types/user';
import { normalizeNickname, RecordStoreError, type UserRepository } from './user.repository';

export class MemoryUserRepository implements UserRepository {
  private readonly users = new Map<string, UserRecord>();
  private readonly nicknames = new Map<string, string>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async get(identity: string): Promise<UserRecord | undefined> {
    const user = this.users.get(identity);
    return user ? { ...user } : undefined;
  }

  async getByNickname(nickname: string): Promise<UserRecord | undefined> {
    const identity = this.nicknames.get(normalizeNickname(nickname));
    return identity ? this.get(identity) : undefined;
  }

  async createIfAbsent(identity: string, nickname: string): Promise<UserRecord> {
    if (this.users.has(identity)) {
      throw new RecordStoreError('already_exists', identity, `User ${identity} already exists`);
    }
    const normalized = normalizeNickname(nickname);
    const owner = this.nicknames.get(normalized);
    if (owner !== undefined && owner !== identity) {
      throw new RecordStoreError('nickname_taken', identity, `Nickname ${nickname} is already taken`);
    }

    const timestamp = this.now().toISOString();
    const record: UserRecord = { identity, nickname, created_at: timestamp, updated_at: timestamp };
    this.users.set(identity, record);
    this.nicknames.set(normalized, identity);
    return { ...record };
  }

  async setImageUrl(identity: string, image: ImageRef | null): Promise<UserRecord> {
    const current = this.users.get(identity);
    if (!current) {
      throw new RecordStoreError('not_found', identity, `User ${identity} not found`);
    }

    const next: UserRecord = {
      identity: current.identity,
      nickname: current.nickname,
      created_at: current.created_at,
      updated_at: this.now().toISOString(),
    };
    if (image) {
      next.image_url = image.url;
      next.image_key = image.key;
    }
    this.users.set(identity, next);
    return { ...next };
  }

  async delete(identity: string): Promise<UserRecord> {
    const current = this.users.get(identity);
    if (!current) {
      throw new RecordStoreError('not_found', identity, `User ${identity} not found`);
    }
    this.users.delete(identity);
    const normalized = normalizeNickname(current.nickname);
    if (this.nicknames.get(normalized) === identity) {
      this.nicknames.delete(normalized);
    }
    return { ...current };
  }

  size(): number {
    return this.users.size;
  }
}
