// Subset of the node-redis v4 client exposed by the cache-manager Redis store.
export type RedisTransaction = {
  set: (key: string, value: string) => RedisTransaction;
  del: (key: string) => RedisTransaction;
  sAdd: (key: string, member: string) => RedisTransaction;
  sRem: (key: string, member: string) => RedisTransaction;
  exec: () => Promise<unknown[]>;
};

export type RedisClient = {
  get: (key: string) => Promise<string | null>;
  set: (key: string, value: string) => Promise<unknown>;
  incr: (key: string) => Promise<number>;
  exists: (key: string) => Promise<number>;
  sMembers: (key: string) => Promise<string[]>;
  sRem: (key: string, member: string) => Promise<number>;
  multi: () => RedisTransaction;
};

const REQUIRED_METHODS = ['get', 'set', 'incr', 'exists', 'sMembers', 'sRem', 'multi'] as const;

export function isRedisClient(value: unknown): value is RedisClient {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return REQUIRED_METHODS.every((method) => typeof Reflect.get(value, method) === 'function');
}
