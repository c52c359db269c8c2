import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import { AccessEvaluator } from '../../src/access-keys/access-evaluator.service';
import { ACCESS_KEYS_SECRET } from '../../src/access-keys/access-keys.constants';
import { AccessKeysService } from '../../src/access-keys/access-keys.service';
import { KeyIssuer } from '../../src/access-keys/key-issuer.service';
import { TokenCodec } from '../../src/access-keys/token-codec';
import { CacheService } from '../../src/cache/cache.service';
import { CryptoService } from '../../src/crypto/crypto.service';
import type { RedisTransaction } from '../../src/tenants/redis-client';
import { TenantRouter } from '../../src/tenants/tenant-router.service';

export const TEST_SECRET = 'test-secret-for-access-keys';
export const TEST_PREFIX = 'test-access-keys';

export const TEST_CONFIG: Record<string, unknown> = {
  ACCESS_KEYS_SECRET: TEST_SECRET,
  ACCESS_KEYS_REDIS_PREFIX: TEST_PREFIX,
  ACCESS_KEYS_EXPIRES_IN_DAYS: 30,
  ACCESS_KEYS_STORE_TIMEOUT_MS: 200,
  TENANT_MAIN_NAME: 'main',
  TENANT_NAMES: 'main,alpha,beta',
  ADMIN_API_TOKEN: 'test-admin-token',
  CACHE_REDIS_URL: '',
};

/**
 * Map-backed stand-in for the node-redis calls the tenant stores make.
 * MULTI stages writes and applies them only on EXEC.
 */
export function createInMemoryRedis() {
  const kv = new Map<string, string>();
  const sets = new Map<string, Set<string>>();
  const state: { execFailure: Error | null } = { execFailure: null };

  const del = (key: string): number => (kv.delete(key) || sets.delete(key) ? 1 : 0);
  const sAdd = (key: string, member: string): number => {
    const set = sets.get(key) ?? new Set<string>();
    const before = set.size;
    set.add(member);
    sets.set(key, set);
    return set.size - before;
  };
  const sRem = (key: string, member: string): number => {
    const set = sets.get(key);
    if (!set) {
      return 0;
    }
    const removed = set.delete(member) ? 1 : 0;
    if (set.size === 0) {
      sets.delete(key);
    }
    return removed;
  };

  const client = {
    get: jest.fn(async (key: string) => kv.get(key) ?? null),
    set: jest.fn(async (key: string, value: string) => {
      kv.set(key, value);
      return 'OK';
    }),
    del: jest.fn(async (key: string) => del(key)),
    incr: jest.fn(async (key: string) => {
      const next = Number(kv.get(key) ?? '0') + 1;
      kv.set(key, String(next));
      return next;
    }),
    exists: jest.fn(async (key: string) => (kv.has(key) || sets.has(key) ? 1 : 0)),
    sAdd: jest.fn(async (key: string, member: string) => sAdd(key, member)),
    sMembers: jest.fn(async (key: string) => [...(sets.get(key) ?? new Set<string>())]),
    sRem: jest.fn(async (key: string, member: string) => sRem(key, member)),
    ping: jest.fn(async () => 'PONG'),
    multi: jest.fn((): RedisTransaction => {
      const staged: Array<() => unknown> = [];
      const transaction: RedisTransaction = {
        set: (key: string, value: string) => {
          staged.push(() => kv.set(key, value));
          return transaction;
        },
        del: (key: string) => {
          staged.push(() => del(key));
          return transaction;
        },
        sAdd: (key: string, member: string) => {
          staged.push(() => sAdd(key, member));
          return transaction;
        },
        sRem: (key: string, member: string) => {
          staged.push(() => sRem(key, member));
          return transaction;
        },
        exec: async () => {
          if (state.execFailure) {
            const failure = state.execFailure;
            state.execFailure = null;
            throw failure;
          }
          return staged.map((apply) => apply());
        },
      };
      return transaction;
    }),
  };

  return {
    kv,
    sets,
    client,
    failNextExec(error: Error = new Error('EXECABORT')): void {
      state.execFailure = error;
    },
  };
}

export type InMemoryRedis = ReturnType<typeof createInMemoryRedis>;

export function createCacheManager(client: unknown) {
  return {
    get: jest.fn(async () => undefined),
    set: jest.fn(async () => undefined),
    del: jest.fn(async () => undefined),
    store: {
      client,
      isFallback: false,
    },
  };
}

export function createConfigService(overrides: Record<string, unknown> = {}) {
  const values: Record<string, unknown> = { ...TEST_CONFIG, ...overrides };
  return {
    get: jest.fn((key: string) => values[key]),
  };
}

export async function createAccessKeysTestingModule(
  redis: InMemoryRedis,
  configOverrides: Record<string, unknown> = {},
): Promise<TestingModule> {
  return Test.createTestingModule({
    providers: [
      CryptoService,
      TokenCodec,
      KeyIssuer,
      AccessEvaluator,
      AccessKeysService,
      TenantRouter,
      CacheService,
      { provide: ACCESS_KEYS_SECRET, useValue: TEST_SECRET },
      { provide: CACHE_MANAGER, useValue: createCacheManager(redis.client) },
      { provide: ConfigService, useValue: createConfigService(configOverrides) },
    ],
  }).compile();
}
