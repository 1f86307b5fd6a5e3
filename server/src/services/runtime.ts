/**
 * cold start 당 1회: 설정 로드 → repository 선택(live/mock) → UserService 생성.
 * IMPLEMENTATION STATUS: OK (Lambda 컨테이너 재사용 시 인스턴스 공유)
 */

import { getDocumentClient, getS3Client } from '../lib/aws';
import { loadServiceConfig, resetServiceConfig } from '../lib/config';
import { ENV } from '../lib/env';
import { liveOrMock, type Mode } from '../lib/liveOrMock';
import { logger } from '../lib/logger';
import type { AssetRepository } from '../repositories/asset.repository';
import { DynamoUserRepository } from '../repositories/dynamo-user.repository';
import { MemoryAssetRepository } from '../repositories/memory-asset.repository';
import { MemoryUserRepository } from '../repositories/memory-user.repository';
import { S3AssetRepository } from '../repositories/s3-asset.repository';
import type { UserRepository } from '../repositories/user.repository';
import type { ServiceConfig } from '../types/user';
import { SharpImageNormalizer } from './image.service';
import { UserService } from './user.service';

export type Runtime = {
  config: ServiceConfig;
  users: UserRepository;
  assets: AssetRepository;
  service: UserService;
  modes: { users: Mode; assets: Mode };
};

function ttlSeconds(config: ServiceConfig): number {
  return Math.floor(config.accessUrlTtlDays * 24 * 60 * 60);
}

export function createRuntime(config: ServiceConfig): Runtime {
  const userMode = liveOrMock('dynamodb');
  const assetMode = liveOrMock('s3');

  const users: UserRepository =
    userMode === 'live'
      ? new DynamoUserRepository(getDocumentClient(), { tableName: ENV.USER_TABLE_NAME })
      : new MemoryUserRepository();

  const assets: AssetRepository =
    assetMode === 'live'
      ? new S3AssetRepository(getS3Client(), {
          bucket: ENV.PHOTO_BUCKET_NAME,
          accessUrlTtlSeconds: ttlSeconds(config),
        })
      : new MemoryAssetRepository({ accessUrlTtlSeconds: ttlSeconds(config) });

  if (userMode === 'mock' || assetMode === 'mock') {
    logger.warn(
      { users: userMode, assets: assetMode, mock: ENV.MOCK },
      'Using in-memory storage; data is lost when the process exits'
    );
  }

  const service = new UserService({ users, assets, images: new SharpImageNormalizer(), config });
  return { config, users, assets, service, modes: { users: userMode, assets: assetMode } };
}

let runtime: Promise<Runtime> | null = null;

export function getRuntime(): Promise<Runtime> {
  if (!runtime) {
    // a failed cold start must not pin the rejected promise for later invocations
    runtime = loadServiceConfig()
      .then(createRuntime)
      .catch((error: unknown) => {
        runtime = null;
        throw error;
      });
  }
  return runtime;
}

export async function getUserService(): Promise<UserService> {
  return (await getRuntime()).service;
}

export function resetRuntime(): void {
  runtime = null;
  resetServiceConfig();
}
