import { Redis } from 'ioredis';
import type { Logger } from './logger.js';

export type RedisClient = Redis;

const MAX_RECONNECT_ATTEMPTS = 20;

/** Reconnect backoff for the price cache; `null` stops reconnecting. */
export function cacheRetryDelay(times: number): number | null {
  if (times > MAX_RECONNECT_ATTEMPTS) return null;
  return Math.min(times * 250, 3000);
}

export function createRedisClient(url: string, logger: Logger): RedisClient {
  const client = new Redis(url, {
    keyPrefix: 'journal:',
    maxRetriesPerRequest: 1,
    retryStrategy: cacheRetryDelay,
    lazyConnect: true,
  });

  client.on('connect', () => {
    logger.info('Redis connected');
  });

  client.on('error', (err: Error) => {
    logger.error({ err }, 'Redis error');
  });

  client.on('end', () => {
    logger.warn('Redis connection ended, price cache unavailable');
  });

  return client;
}
