import type { CacheStore } from '@nestjs/cache-manager';
import { CacheModule as NestCacheModule } from '@nestjs/cache-manager';
import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { redisStore } from 'cache-manager-redis-yet';

import { CacheService } from './cache.service';

type KeyStore = CacheStore & { isFallback: boolean };

const DEFAULT_CONNECT_TIMEOUT_MS = 2000;

// Has no client, so every tenant lookup fails closed with store-unavailable.
function createFallbackStore(): KeyStore {
  return {
    get: async <T>() => undefined as T | undefined,
    set: async () => undefined,
    del: async () => undefined,
    isFallback: true,
  };
}

async function createKeyStore(configService: ConfigService): Promise<KeyStore> {
  const logger = new Logger('CacheModule');
  const url = configService.get<string>('CACHE_REDIS_URL') ?? '';
  if (url.length === 0) {
    logger.warn('CACHE_REDIS_URL is empty; access keys will be unavailable.');
    return createFallbackStore();
  }

  const configuredTimeout = Number(configService.get('ACCESS_KEYS_STORE_TIMEOUT_MS'));
  const connectTimeout =
    Number.isInteger(configuredTimeout) && configuredTimeout > 0
      ? configuredTimeout
      : DEFAULT_CONNECT_TIMEOUT_MS;

  try {
    const store = (await redisStore({ url, socket: { connectTimeout } })) as CacheStore;
    return Object.assign(store, { isFallback: false });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`Redis unavailable (${reason}); using the fallback store.`);
    return createFallbackStore();
  }
}

@Module({
  imports: [
    NestCacheModule.registerAsync({
      inject: [ConfigService],
      useFactory: async (configService: ConfigService) => ({
        store: await createKeyStore(configService),
      }),
    }),
  ],
  providers: [CacheService],
  exports: [CacheService],
})
export class CacheModule {}
