/**
 * User record persistence on DynamoDB (single table).
 * IMPLEMENTATION STATUS:
 * - Key pattern + conditional transactions for identity/nickname uniqueness: OK
 * - Nickname lookup via claim item (strongly consistent GetItem, no GSI): OK
 *
 * Key pattern:
 *   PK: USER#<identity>       SK: PROFILE   (user record)
 *   PK: NICKNAME#<lowercase>  SK: CLAIM     (nickname claim → identity)
 */

import { randomUUID } from 'node:crypto';
import { ConditionalCheckFailedException, TransactionCanceledException } from '@aws-sdk/client-dynamodb';
import {
  GetCommand,
  TransactWriteCommand,
  UpdateCommand,
  type DynamoDBDocumentClient,
} from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import { logger } from '../lib/logger';
import type { ImageRef, UserRecord } from '../types/user';
import { normalizeNickname, RecordStoreError, type UserRepository } from './user.repository';

const PROFILE_SK = 'PROFILE';
const CLAIM_SK = 'CLAIM';

const UserItemSchema = z.object({
  identity: z.string(),
  nickname: z.string(),
  image_url: z.string().optional(),
  image_key: z.string().optional(),
  created_at: z.string(),
  updated_at: z.string(),
});

const ClaimItemSchema = z.object({
  identity: z.string(),
});

function userKey(identity: string) {
  return { PK: `USER#${identity}`, SK: PROFILE_SK };
}

function claimKey(nickname: string) {
  return { PK: `NICKNAME#${normalizeNickname(nickname)}`, SK: CLAIM_SK };
}

function fromItem(item: Record<string, unknown>): UserRecord {
  const parsed = UserItemSchema.parse(item);
  const record: UserRecord = {
    identity: parsed.identity,
    nickname: parsed.nickname,
    created_at: parsed.created_at,
    updated_at: parsed.updated_at,
  };
  if (parsed.image_url) record.image_url = parsed.image_url;
  if (parsed.image_key) record.image_key = parsed.image_key;
  return record;
}

function isConditionFailure(reason: { Code?: string | undefined } | undefined): boolean {
  return reason?.Code === 'ConditionalCheckFailed';
}

export type DynamoUserRepositoryOptions = {
  tableName: string;
  now?: () => Date;
};

export class DynamoUserRepository implements UserRepository {
  private readonly tableName: string;
  private readonly now: () => Date;

  constructor(private readonly client: DynamoDBDocumentClient, options: DynamoUserRepositoryOptions) {
    this.tableName = options.tableName;
    this.now = options.now ?? (() => new Date());
  }

  async get(identity: string): Promise<UserRecord | undefined> {
    const result = await this.client.send(
      new GetCommand({ TableName: this.tableName, Key: userKey(identity), ConsistentRead: true })
    );
    return result.Item ? fromItem(result.Item) : undefined;
  }

  async getByNickname(nickname: string): Promise<UserRecord | undefined> {
    const claim = await this.client.send(
      new GetCommand({ TableName: this.tableName, Key: claimKey(nickname), ConsistentRead: true })
    );
    if (!claim.Item) return undefined;

    const { identity } = ClaimItemSchema.parse(claim.Item);
    const user = await this.get(identity);
    if (!user) {
      logger.warn({ identity, nickname }, 'Nickname claim points at a missing user record');
    }
    return user;
  }

  async createIfAbsent(identity: string, nickname: string): Promise<UserRecord> {
    const timestamp = this.now().toISOString();
    const record: UserRecord = { identity, nickname, created_at: timestamp, updated_at: timestamp };

    try {
      await this.client.send(
        new TransactWriteCommand({
          // same token on SDK-level retries of this call keeps the write idempotent
          ClientRequestToken: randomUUID(),
          TransactItems: [
            {
              Put: {
                TableName: this.tableName,
                Item: {
                  ...userKey(identity),
                  entity: 'USER',
                  ...record,
                  nickname_normalized: normalizeNickname(nickname),
                },
                ConditionExpression: 'attribute_not_exists(PK)',
              },
            },
            {
              Put: {
                TableName: this.tableName,
                Item: {
                  ...claimKey(nickname),
                  entity: 'NICKNAME',
                  identity,
                  nickname,
                  created_at: timestamp,
                },
                ConditionExpression: 'attribute_not_exists(PK)',
              },
            },
          ],
        })
      );
    } catch (error) {
      if (error instanceof TransactionCanceledException) {
        const [userReason, claimReason] = error.CancellationReasons ?? [];
        if (isConditionFailure(userReason)) {
          throw new RecordStoreError('already_exists', identity, `User ${identity} already exists`);
        }
        if (isConditionFailure(claimReason)) {
          throw new RecordStoreError('nickname_taken', identity, `Nickname ${nickname} is already taken`);
        }
      }
      throw error;
    }

    logger.info({ identity, nickname }, 'Created user record');
    return record;
  }

  async setImageUrl(identity: string, image: ImageRef | null): Promise<UserRecord> {
    const timestamp = this.now().toISOString();
    const command = image
      ? new UpdateCommand({
          TableName: this.tableName,
          Key: userKey(identity),
          ConditionExpression: 'attribute_exists(PK)',
          UpdateExpression: 'SET image_url = :url, image_key = :key, updated_at = :now',
          ExpressionAttributeValues: { ':url': image.url, ':key': image.key, ':now': timestamp },
          ReturnValues: 'ALL_NEW',
        })
      : new UpdateCommand({
          TableName: this.tableName,
          Key: userKey(identity),
          ConditionExpression: 'attribute_exists(PK)',
          UpdateExpression: 'SET updated_at = :now REMOVE image_url, image_key',
          ExpressionAttributeValues: { ':now': timestamp },
          ReturnValues: 'ALL_NEW',
        });

    try {
      const result = await this.client.send(command);
      if (!result.Attributes) {
        throw new Error(`UpdateItem returned no attributes for ${identity}`);
      }
      return fromItem(result.Attributes);
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        throw new RecordStoreError('not_found', identity, `User ${identity} not found`);
      }
      throw error;
    }
  }

  async delete(identity: string): Promise<UserRecord> {
    const existing = await this.get(identity);
    if (!existing) {
      throw new RecordStoreError('not_found', identity, `User ${identity} not found`);
    }

    try {
      await this.client.send(
        new TransactWriteCommand({
          ClientRequestToken: randomUUID(),
          TransactItems: [
            {
              Delete: {
                TableName: this.tableName,
                Key: userKey(identity),
                ConditionExpression: 'attribute_exists(PK)',
              },
            },
            {
              Delete: {
                TableName: this.tableName,
                Key: claimKey(existing.nickname),
                ConditionExpression: 'attribute_not_exists(PK) OR #identity = :identity',
                ExpressionAttributeNames: { '#identity': 'identity' },
                ExpressionAttributeValues: { ':identity': identity },
              },
            },
          ],
        })
      );
    } catch (error) {
      if (error instanceof TransactionCanceledException) {
        const [userReason] = error.CancellationReasons ?? [];
        if (isConditionFailure(userReason)) {
          throw new RecordStoreError('not_found', identity, `User ${identity} not found`);
        }
      }
      throw error;
    }

    logger.info({ identity, nickname: existing.nickname }, 'Deleted user record');
    return existing;
  }
}
