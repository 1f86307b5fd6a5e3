/**
 * In-memory AssetRepository (MOCK=1 / tests).
 * Access URLs are opaque `memory://` links carrying their expiry.
 */

import type { AssetObject, AssetRef, DeleteManyResult } from '../types/user';
import {
  assetPrefix,
  buildAssetKey,
  clampTtl,
  MAX_ACCESS_URL_TTL_SECONDS,
  type AssetRepository,
} from './asset.repository';

type StoredAsset = {
  bytes: Buffer;
  contentType: string;
  metadata: Record<string, string>;
  lastModified: Date;
};

export type MemoryAssetRepositoryOptions = {
  bucket?: string;
  accessUrlTtlSeconds?: number;
  now?: () => Date;
};

export class MemoryAssetRepository implements AssetRepository {
  private readonly objects = new Map<string, StoredAsset>();
  private readonly bucket: string;
  private readonly accessUrlTtlSeconds: number;
  private readonly now: () => Date;

  constructor(options: MemoryAssetRepositoryOptions = {}) {
    this.bucket = options.bucket ?? 'local-photos';
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
    let key = buildAssetKey(identity, contentType, now);
    while (this.objects.has(key)) {
      key = buildAssetKey(identity, contentType, now);
    }
    this.objects.set(key, { bytes: Buffer.from(bytes), contentType, metadata: { ...metadata }, lastModified: now });
    return { key, accessUrl: await this.issueAccessUrl(key) };
  }

  async listByPrefix(identity: string): Promise<AssetObject[]> {
    const prefix = assetPrefix(identity);
    return [...this.objects.entries()]
      .filter(([key]) => key.startsWith(prefix))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, asset]) => ({
        key,
        size: asset.bytes.length,
        lastModified: asset.lastModified.toISOString(),
      }));
  }

  async deleteMany(keys: string[]): Promise<DeleteManyResult> {
    const deleted: string[] = [];
    for (const key of keys) {
      // S3 DeleteObjects reports absent keys as deleted too
      this.objects.delete(key);
      deleted.push(key);
    }
    return { deleted, failed: [] };
  }

  async issueAccessUrl(key: string, ttlSeconds: number = this.accessUrlTtlSeconds): Promise<string> {
    const expires = Math.floor(this.now().getTime() / 1000) + clampTtl(ttlSeconds);
    return `memory://${this.bucket}/${key}?expires=${expires}`;
  }

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  read(key: string): StoredAsset | undefined {
    return this.objects.get(key);
  }

  keys(): string[] {
    return [...this.objects.keys()].sort();
  }
}
