/**
 * Photo asset storage contract.
 * IMPLEMENTATION STATUS:
 * - S3 implementation (presigned GET URLs, batched deletes): s3-asset.repository.ts
 * - In-memory implementation for MOCK=1 and tests: memory-asset.repository.ts
 */

import { randomUUID } from 'node:crypto';
import type { AssetObject, AssetRef, DeleteManyResult } from '../types/user';

export const ASSET_ROOT = 'users';
/** SigV4 presigned URLs cannot outlive 7 days. */
export const MAX_ACCESS_URL_TTL_SECONDS = 7 * 24 * 60 * 60;

export interface AssetRepository {
  /** Always writes under a fresh key; never overwrites. */
  put(
    identity: string,
    bytes: Buffer,
    contentType: string,
    metadata?: Record<string, string>
  ): Promise<AssetRef>;
  /** Ordered by key, i.e. oldest upload first. */
  listByPrefix(identity: string): Promise<AssetObject[]>;
  deleteMany(keys: string[]): Promise<DeleteManyResult>;
  issueAccessUrl(key: string, ttlSeconds?: number): Promise<string>;
  exists(key: string): Promise<boolean>;
}

export function assetPrefix(identity: string): string {
  return `${ASSET_ROOT}/${encodeURIComponent(identity)}/`;
}

const EXTENSIONS: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/png': 'png',
  'image/webp': 'webp',
  'image/gif': 'gif',
};

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/** users/<identity>/<yyyyMMdd_HHmmss>_<8 hex>.<ext> */
export function buildAssetKey(identity: string, contentType: string, now: Date = new Date()): string {
  const extension = EXTENSIONS[contentType] ?? 'bin';
  const suffix = randomUUID().replace(/-/g, '').slice(0, 8);
  return `${assetPrefix(identity)}${formatTimestamp(now)}_${suffix}.${extension}`;
}

export function clampTtl(ttlSeconds: number): number {
  return Math.max(1, Math.min(Math.floor(ttlSeconds), MAX_ACCESS_URL_TTL_SECONDS));
}
