import type { StoreCallOptions } from '../access-keys/types';
import type { RedisClient } from './redis-client';
import { runStoreCall } from './store-call';

/** Shared `userId -> tenant` directory. Writes are last-writer-wins. */
export class DirectoryStore {
  constructor(
    private readonly redis: RedisClient,
    private readonly redisPrefix: string,
    private readonly defaultTimeoutMs: number,
  ) {}

  async get(userId: string, options: StoreCallOptions = {}): Promise<string | null> {
    return runStoreCall(
      'directory.get',
      () => this.redis.get(this.entryKey(userId)),
      options,
      this.defaultTimeoutMs,
    );
  }

  async set(userId: string, tenant: string, options: StoreCallOptions = {}): Promise<void> {
    await runStoreCall(
      'directory.set',
      () => this.redis.set(this.entryKey(userId), tenant),
      options,
      this.defaultTimeoutMs,
    );
  }

  private entryKey(userId: string): string {
    return `${this.redisPrefix}:directory:${userId}`;
  }
}
