/**
 * Photo asset storage on S3.
 * IMPLEMENTATION STATUS:
 * - PutObject under users/<identity>/ with fresh keys: OK
 * - Paginated listing + DeleteObjects batches (1000) with per-key fallback: OK
 * - Presigned GET URLs (max 7 days): OK
 */

import {
  DeleteObjectCommand,
  DeleteObjectsCommand,
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3ServiceException,
  paginateListObjectsV2,
  type S3Client,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { logger } from '../lib/logger';
import type { AssetDeleteFailure, AssetObject, AssetRef, DeleteManyResult } from '../types/user';
import {
  assetPrefix,
  buildAssetKey,
  clampTtl,
  MAX_ACCESS_URL_TTL_SECONDS,
  type AssetRepository,
} from './asset.repository';

const DELETE_BATCH_SIZE = 1000;
const CACHE_CONTROL = 'max-age=31536000';

export type S3AssetRepositoryOptions = {
  bucket: string;
  accessUrlTtlSeconds?: number;
  now?: () => Date;
};

function errorCode(error: unknown): string {
  if (error instanceof S3ServiceException) return error.name;
  if (error instanceof Error) return error.name;
  return 'Unknown';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class S3AssetRepository implements AssetRepository {
  private readonly bucket: string;
  private readonly accessUrlTtlSeconds: number;
  private readonly now: () => Date;

  constructor(private readonly client: S3Client, options: S3AssetRepositoryOptions) {
    this.bucket = options.bucket;
    this.accessUrlTtlSeconds = options.accessUrlTtlSeconds ?? MAX_ACCESS_URL_TTL_SECONDS;
    this.now = options.now ?? (() => new Date());
  }

  async put(
    identity: string,
    bytes: Buffer,
    contentType: string,
    metadata: Record<string, string> = {}
  ): Promise<AssetRef> {
    const now = this.now();
    const key = buildAssetKey(identity, contentType, now);

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: bytes,
        ContentType: contentType,
        CacheControl: CACHE_CONTROL,
        Metadata: { ...metadata, upload_timestamp: now.toISOString() },
      })
    );
    logger.info({ bucket: this.bucket, key, bytes: bytes.length }, 'Stored photo asset');

    return { key, accessUrl: await this.issueAccessUrl(key) };
  }

  async listByPrefix(identity: string): Promise<AssetObject[]> {
    const objects: AssetObject[] = [];
    const pages = paginateListObjectsV2(
      { client: this.client },
      { Bucket: this.bucket, Prefix: assetPrefix(identity) }
    );

    for await (const page of pages) {
      for (const item of page.Contents ?? []) {
        if (!item.Key) continue;
        const object: AssetObject = { key: item.Key };
        if (item.Size !== undefined) object.size = item.Size;
        if (item.LastModified) object.lastModified = item.LastModified.toISOString();
        objects.push(object);
      }
    }

    return objects.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  }

  async deleteMany(keys: string[]): Promise<DeleteManyResult> {
    const deleted: string[] = [];
    const failed: AssetDeleteFailure[] = [];

    for (let start = 0; start < keys.length; start += DELETE_BATCH_SIZE) {
      const batch = keys.slice(start, start + DELETE_BATCH_SIZE);
      try {
        const response = await this.client.send(
          new DeleteObjectsCommand({
            Bucket: this.bucket,
            Delete: { Objects: batch.map((Key) => ({ Key })), Quiet: false },
          })
        );
        for (const item of response.Deleted ?? []) {
          if (item.Key) deleted.push(item.Key);
        }
        for (const item of response.Errors ?? []) {
          failed.push({
            key: item.Key ?? '',
            code: item.Code ?? 'Unknown',
            message: item.Message ?? 'Delete failed',
          });
        }
      } catch (error) {
        logger.warn(
          { bucket: this.bucket, batchSize: batch.length, error: errorMessage(error) },
          'Batch delete failed; falling back to single deletes'
        );
        for (const key of batch) {
          try {
            await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
            deleted.push(key);
          } catch (singleError) {
            failed.push({ key, code: errorCode(singleError), message: errorMessage(singleError) });
          }
        }
      }
    }

    if (failed.length > 0) {
      logger.warn({ bucket: this.bucket, failed }, 'Some photo assets could not be deleted');
    }
    return { deleted, failed };
  }

  async issueAccessUrl(key: string, ttlSeconds: number = this.accessUrlTtlSeconds): Promise<string> {
    return getSignedUrl(this.client, new GetObjectCommand({ Bucket: this.bucket, Key: key }), {
      expiresIn: clampTtl(ttlSeconds),
    });
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return true;
    } catch (error) {
      if (error instanceof S3ServiceException && (error.name === 'NotFound' || error.$metadata.httpStatusCode === 404)) {
        return false;
      }
      throw error;
    }
  }
}
