import { createHash } from 'node:crypto';
import { Redis, type RedisOptions } from 'ioredis';
import { z } from 'zod';
import { EMBEDDING_CONFIG } from '@eduflow/shared';
import type { AppConfig } from '../config';
import type { EmbeddingCache } from '../services/embedding';
import type { Logger } from './logger';

/**
 * Redis client for the embedding cache.
 *
 * Keys: `embed:{modelId}:{sha256(text)}` so vectors from different models
 * never collide. Values are JSON arrays with a TTL (default 24h).
 */

export function createRedisClient(redisConfig: AppConfig['redis'], logger: Logger): Redis {
  const options: RedisOptions = {
    retryStrategy: (times: number) => Math.min(times * 50, 2000),
    maxRetriesPerRequest: 3,
    connectTimeout: 10000,
    lazyConnect: true,
  };

  const redis = redisConfig.url
    ? new Redis(redisConfig.url, options)
    : new Redis({
        ...options,
        host: redisConfig.host,
        port: redisConfig.port,
        password: redisConfig.password,
      });

  logger.info({ redisUrl: !!redisConfig.url, host: redisConfig.host }, 'Initializing Redis connection');

  redis.on('error', (err) => {
    logger.error({ err }, 'Redis connection error');
  });

  redis.on('connect', () => {
    logger.info('Redis connected');
  });

  return redis;
}

/**
 * Health check: verify Redis connectivity.
 */
export async function checkRedisHealth(redis: Redis): Promise<boolean> {
  try {
    await redis.ping();
    return true;
  } catch {
    return false;
  }
}

const CachedVectorSchema = z.array(z.number());

export class RedisEmbeddingCache implements EmbeddingCache {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds: number = EMBEDDING_CONFIG.CACHE_TTL
  ) {}

  static keyFor(modelId: string, text: string): string {
    return `embed:${modelId}:${createHash('sha256').update(text).digest('hex')}`;
  }

  async getMany(modelId: string, texts: readonly string[]): Promise<Array<number[] | null>> {
    if (texts.length === 0) {
      return [];
    }

    const values = await this.redis.mget(texts.map((text) => RedisEmbeddingCache.keyFor(modelId, text)));
    return values.map((value) => {
      if (value === null) return null;
      const parsed = CachedVectorSchema.safeParse(JSON.parse(value));
      return parsed.success ? parsed.data : null;
    });
  }

  async setMany(modelId: string, entries: ReadonlyArray<{ text: string; vector: number[] }>): Promise<void> {
    if (entries.length === 0) {
      return;
    }

    const pipeline = this.redis.pipeline();
    for (const { text, vector } of entries) {
      pipeline.setex(RedisEmbeddingCache.keyFor(modelId, text), this.ttlSeconds, JSON.stringify(vector));
    }

    const results = await pipeline.exec();
    const failed = results?.find(([error]) => error !== null);
    if (failed?.[0]) {
      throw failed[0];
    }
  }
}
