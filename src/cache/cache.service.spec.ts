import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';

import { createCacheManager, createInMemoryRedis } from '../../test/support/in-memory-redis';
import { CacheService } from './cache.service';

describe('CacheService', () => {
  const buildService = async (cacheManager: unknown): Promise<CacheService> => {
    const module = await Test.createTestingModule({
      providers: [CacheService, { provide: CACHE_MANAGER, useValue: cacheManager }],
    }).compile();
    return module.get(CacheService);
  };

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('exposes the Redis client of the store', async () => {
    const redis = createInMemoryRedis();
    const service = await buildService(createCacheManager(redis.client));

    expect(service.getStoreClient()).toBe(redis.client);
    await expect(service.checkHealth()).resolves.toEqual({ status: 'ok' });
  });

  it('hides the client of the fallback store', async () => {
    const service = await buildService({ store: { isFallback: true } });

    expect(service.getStoreClient()).toBeNull();
    await expect(service.checkHealth()).resolves.toEqual({
      status: 'degraded',
      message: 'Cache store client unavailable',
    });
  });

  it('reports a degraded store when ping fails', async () => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    const redis = createInMemoryRedis();
    redis.client.ping.mockRejectedValueOnce(new Error('ECONNREFUSED'));
    const service = await buildService(createCacheManager(redis.client));

    await expect(service.checkHealth()).resolves.toEqual({
      status: 'degraded',
      message: 'Cache backend unreachable',
    });
  });
});
