import { Logger } from '@nestjs/common';

import { keyIndexMember, parseKeyIndexMember, parseKeyRecord } from '../access-keys/key-record';
import type { KeyKind, KeyRecord, StoreCallOptions } from '../access-keys/types';
import { hashKeyForLogging } from '../utils/hash';
import type { RedisClient, RedisTransaction } from './redis-client';
import { runStoreCall } from './store-call';

const ACCESS_RECORD_PRESENT = '1';

/**
 * Handle to one tenant's keyspace. Key records and access records of a tenant
 * live under `<prefix>:tenant:<name>:`.
 */
export class TenantStore {
  private readonly logger = new Logger(TenantStore.name);

  constructor(
    readonly name: string,
    private readonly redis: RedisClient,
    private readonly redisPrefix: string,
    private readonly defaultTimeoutMs: number,
  ) {}

  async nextKeyId(options: StoreCallOptions = {}): Promise<number> {
    return this.call('nextKeyId', () => this.redis.incr(this.sequenceKey()), options);
  }

  async getKeyRecord(
    kind: KeyKind,
    id: number,
    options: StoreCallOptions = {},
  ): Promise<KeyRecord | null> {
    const key = this.keyRecordKey(kind, id);
    const raw = await this.call('getKeyRecord', () => this.redis.get(key), options);
    if (!raw) {
      return null;
    }

    const record = parseKeyRecord(raw);
    if (!record || record.kind !== kind || record.id !== id) {
      this.logger.warn(`Invalid key record payload for key hash ${hashKeyForLogging(key)}`);
      return null;
    }

    return record;
  }

  async hasAccessRecord(
    verificationHash: string,
    options: StoreCallOptions = {},
  ): Promise<boolean> {
    const count = await this.call(
      'hasAccessRecord',
      () => this.redis.exists(this.accessRecordKey(verificationHash)),
      options,
    );
    return count > 0;
  }

  async isRevoked(kind: KeyKind, id: number, options: StoreCallOptions = {}): Promise<boolean> {
    const count = await this.call(
      'isRevoked',
      () => this.redis.exists(this.revokedMarkerKey(kind, id)),
      options,
    );
    return count > 0;
  }

  async listKeyRecords(ownerId: string, options: StoreCallOptions = {}): Promise<KeyRecord[]> {
    const indexKey = this.ownerIndexKey(ownerId);
    const members = await this.call('listKeyRecords', () => this.redis.sMembers(indexKey), options);

    const records: KeyRecord[] = [];
    for (const member of members) {
      const ref = parseKeyIndexMember(member);
      const record = ref ? await this.getKeyRecord(ref.kind, ref.id, options) : null;
      if (record && record.ownerId === ownerId) {
        records.push(record);
        continue;
      }
      await this.call('pruneKeyIndex', () => this.redis.sRem(indexKey, member), options);
    }

    return records.sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.id - a.id);
  }

  keyRecordKey(kind: KeyKind, id: number): string {
    return `${this.keyspace()}:key:${kind}:${id}`;
  }

  accessRecordKey(verificationHash: string): string {
    return `${this.keyspace()}:access:${verificationHash}`;
  }

  revokedMarkerKey(kind: KeyKind, id: number): string {
    return `${this.keyspace()}:revoked:${kind}:${id}`;
  }

  ownerIndexKey(ownerId: string): string {
    return `${this.keyspace()}:owner:${ownerId}`;
  }

  private sequenceKey(): string {
    return `${this.keyspace()}:seq`;
  }

  private keyspace(): string {
    return `${this.redisPrefix}:tenant:${this.name}`;
  }

  private call<T>(
    operation: string,
    call: () => Promise<T>,
    options: StoreCallOptions,
  ): Promise<T> {
    return runStoreCall(`${this.name}.${operation}`, call, options, this.defaultTimeoutMs);
  }
}

/**
 * Writes staged across tenant stores and committed with a single MULTI/EXEC.
 * Either every staged row lands or none does.
 */
export class TenantTransaction {
  private staged = 0;

  constructor(
    private readonly multi: RedisTransaction,
    private readonly defaultTimeoutMs: number,
  ) {}

  putKeyRecord(store: TenantStore, record: KeyRecord): this {
    this.multi.set(store.keyRecordKey(record.kind, record.id), JSON.stringify(record));
    this.multi.sAdd(store.ownerIndexKey(record.ownerId), keyIndexMember(record.kind, record.id));
    this.staged += 2;
    return this;
  }

  // Leaves a marker so later lookups of the id report revocation, not absence.
  removeKeyRecord(store: TenantStore, record: KeyRecord): this {
    this.multi.del(store.keyRecordKey(record.kind, record.id));
    this.multi.sRem(store.ownerIndexKey(record.ownerId), keyIndexMember(record.kind, record.id));
    this.multi.set(store.revokedMarkerKey(record.kind, record.id), record.ownerId);
    this.staged += 3;
    return this;
  }

  putAccessRecord(store: TenantStore, verificationHash: string): this {
    this.multi.set(store.accessRecordKey(verificationHash), ACCESS_RECORD_PRESENT);
    this.staged += 1;
    return this;
  }

  removeAccessRecord(store: TenantStore, verificationHash: string): this {
    this.multi.del(store.accessRecordKey(verificationHash));
    this.staged += 1;
    return this;
  }

  async commit(options: StoreCallOptions = {}): Promise<void> {
    if (this.staged === 0) {
      return;
    }

    await runStoreCall('commit', () => this.multi.exec(), options, this.defaultTimeoutMs);
  }
}
