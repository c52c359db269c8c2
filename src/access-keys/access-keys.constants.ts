export const ACCESS_KEYS_SECRET = Symbol('ACCESS_KEYS_SECRET');

export const ACCESS_KEY_HEADER = 'x-api-key';

export const GRAPHQL_PATH = '/graphql';
