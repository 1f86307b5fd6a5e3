/**
 * AWS SDK 클라이언트 헬퍼: Lambda 컨테이너 재사용을 위해 lazy singleton으로 생성한다.
 * IMPLEMENTATION STATUS:
 * - DynamoDB DocumentClient / S3 / SSM 클라이언트 초기화: OK (env 기반)
 * - 로컬 개발(MOCK=1)에서는 호출되지 않음: OK
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { S3Client } from '@aws-sdk/client-s3';
import { SSMClient } from '@aws-sdk/client-ssm';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { ENV } from './env';
import { logger } from './logger';

let documentClient: DynamoDBDocumentClient | null = null;
let s3Client: S3Client | null = null;
let ssmClient: SSMClient | null = null;

export function getDocumentClient(): DynamoDBDocumentClient {
  if (documentClient) return documentClient;

  documentClient = DynamoDBDocumentClient.from(new DynamoDBClient({ region: ENV.AWS_REGION }), {
    marshallOptions: { removeUndefinedValues: true },
  });
  logger.info({ region: ENV.AWS_REGION, table: ENV.USER_TABLE_NAME }, 'Initialized DynamoDB document client');
  return documentClient;
}

export function getS3Client(): S3Client {
  if (s3Client) return s3Client;

  s3Client = new S3Client({ region: ENV.AWS_REGION });
  logger.info({ region: ENV.AWS_REGION, bucket: ENV.PHOTO_BUCKET_NAME }, 'Initialized S3 client');
  return s3Client;
}

export function getSsmClient(): SSMClient {
  if (ssmClient) return ssmClient;

  ssmClient = new SSMClient({ region: ENV.AWS_REGION });
  return ssmClient;
}

export function closeClients(): void {
  documentClient?.destroy();
  s3Client?.destroy();
  ssmClient?.destroy();
  documentClient = null;
  s3Client = null;
  ssmClient = null;
}
