import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import {
  StoreUnavailableError,
  TenantNotFoundError,
  UnknownTenantError,
} from '../access-keys/errors';
import type { StoreCallOptions } from '../access-keys/types';
import { CacheService } from '../cache/cache.service';
import { DirectoryStore } from './directory-store';
import { isRedisClient, RedisClient } from './redis-client';
import { TenantStore, TenantTransaction } from './tenant-store';

@Injectable()
export class TenantRouter {
  private readonly logger = new Logger(TenantRouter.name);
  private readonly redisPrefix: string;
  private readonly mainTenant: string;
  private readonly tenantNames: string[];
  private readonly storeTimeoutMs: number;

  constructor(
    private readonly cacheService: CacheService,
    private readonly configService: ConfigService,
  ) {
    this.redisPrefix = this.configService.get<string>('ACCESS_KEYS_REDIS_PREFIX') ?? 'access-keys';
    this.mainTenant = this.configService.get<string>('TENANT_MAIN_NAME')?.trim() || 'main';
    this.tenantNames = this.parseTenantNames(this.configService.get<unknown>('TENANT_NAMES'));
    this.storeTimeoutMs = this.parsePositiveInteger(
      this.configService.get<unknown>('ACCESS_KEYS_STORE_TIMEOUT_MS'),
      2000,
      'ACCESS_KEYS_STORE_TIMEOUT_MS',
    );
  }

  listTenants(): string[] {
    return [...this.tenantNames];
  }

  /** The main registry, which holds every key record. */
  main(): TenantStore {
    return this.open(this.mainTenant);
  }

  open(name: string): TenantStore {
    if (!this.tenantNames.includes(name)) {
      throw new UnknownTenantError(`Unknown tenant: ${name}`);
    }

    return new TenantStore(name, this.getRedisClient(), this.redisPrefix, this.storeTimeoutMs);
  }

  async resolve(userId: string, options: StoreCallOptions = {}): Promise<TenantStore> {
    const tenant = await this.getAssignment(userId, options);
    if (!tenant) {
      throw new TenantNotFoundError('No tenant assigned to user');
    }

    if (!this.tenantNames.includes(tenant)) {
      this.logger.warn(`User is assigned to unconfigured tenant ${tenant}`);
      throw new TenantNotFoundError('User is assigned to an unconfigured tenant');
    }

    return this.open(tenant);
  }

  async getAssignment(userId: string, options: StoreCallOptions = {}): Promise<string | null> {
    const normalized = userId.trim();
    if (normalized.length === 0) {
      return null;
    }

    return this.directory().get(normalized, options);
  }

  async setTenant(userId: string, tenant: string, options: StoreCallOptions = {}): Promise<void> {
    const normalized = userId.trim();
    if (normalized.length === 0) {
      throw new TenantNotFoundError('userId is required');
    }
    if (!this.tenantNames.includes(tenant)) {
      throw new UnknownTenantError(`Unknown tenant: ${tenant}`);
    }

    await this.directory().set(normalized, tenant, options);
    this.logger.log(JSON.stringify({ event: 'tenant_assigned', tenant }));
  }

  beginTransaction(): TenantTransaction {
    return new TenantTransaction(this.getRedisClient().multi(), this.storeTimeoutMs);
  }

  private directory(): DirectoryStore {
    return new DirectoryStore(this.getRedisClient(), this.redisPrefix, this.storeTimeoutMs);
  }

  private getRedisClient(): RedisClient {
    const client = this.cacheService.getStoreClient();
    if (!isRedisClient(client)) {
      this.logger.error('Redis client unavailable for tenant routing');
      throw new StoreUnavailableError('Tenant store backend unavailable');
    }

    return client;
  }

  private parseTenantNames(value: unknown): string[] {
    const raw = typeof value === 'string' ? value : '';
    const names = raw
      .split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0);

    return [...new Set([this.mainTenant, ...names])];
  }

  private parsePositiveInteger(value: unknown, fallback: number, fieldName: string): number {
    const parsed = typeof value === 'number' ? value : Number(value);
    if (Number.isInteger(parsed) && parsed > 0) {
      return parsed;
    }

    this.logger.warn(`${fieldName} is invalid; using fallback ${fallback}`);
    return fallback;
  }
}
