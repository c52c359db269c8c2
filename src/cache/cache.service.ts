import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Cache } from 'cache-manager';

type CacheStoreClient = {
  ping?: () => Promise<string>;
};

type CacheStore = {
  client?: CacheStoreClient;
  isFallback?: boolean;
};

/**
 * Access to the Redis client behind the cache-manager store. The no-op
 * fallback store has no client, so callers see `null` and fail closed.
 */
@Injectable()
export class CacheService {
  private readonly logger = new Logger(CacheService.name);

  constructor(@Inject(CACHE_MANAGER) private readonly cacheManager: Cache) {}

  getStoreClient(): unknown {
    const store = this.getStore();
    if (!store || store.isFallback) {
      return null;
    }

    return store.client ?? null;
  }

  async checkHealth(): Promise<{ status: 'ok' | 'degraded'; message?: string }> {
    try {
      const store = this.getStore();
      if (!store?.client?.ping) {
        return { status: 'degraded', message: 'Cache store client unavailable' };
      }
      await store.client.ping();
      return { status: 'ok' };
    } catch (error) {
      this.logger.warn(
        `Cache health check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return { status: 'degraded', message: 'Cache backend unreachable' };
    }
  }

  private getStore(): CacheStore | undefined {
    return (this.cacheManager as { store?: CacheStore }).store;
  }
}
