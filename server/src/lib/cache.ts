import NodeCache from 'node-cache';
import { ENV } from './env';

// stdTTL 0 keeps entries for the lifetime of the container (one cold start).
export const cache = new NodeCache({ stdTTL: ENV.CONFIG_CACHE_TTL_SEC, useClones: false });

export async function cached<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const hit = cache.get<T>(key);
  if (hit !== undefined) return hit;
  const v = await fn();
  cache.set(key, v);
  return v;
}

export function invalidate(key: string): void {
  cache.del(key);
}
