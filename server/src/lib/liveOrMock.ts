// server/src/lib/liveOrMock.ts
import { ENV } from './env';

export type AdapterName = 'dynamodb' | 's3' | 'ssm';
export type Mode = 'live' | 'mock';

function hasConfig(adapter: AdapterName): boolean {
  switch (adapter) {
    case 'dynamodb':
      return !!ENV.USER_TABLE_NAME;
    case 's3':
      return !!ENV.PHOTO_BUCKET_NAME;
    case 'ssm':
      return !!ENV.PARAMETER_STORE_PREFIX;
  }
}

export function liveOrMock(adapter: AdapterName): Mode {
  if (ENV.MOCK === 1) return 'mock';
  return hasConfig(adapter) ? 'live' : 'mock';
}
