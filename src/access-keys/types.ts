import type { TenantStore } from '../tenants/tenant-store';

export type KeyKind = 'endpoint' | 'query';

export type FieldPermission = {
  operationName: string;
  allowedFields: string[];
};

type KeyRecordBase = {
  id: number;
  ownerId: string;
  name: string;
  createdAt: string;
  expiresInDays: number;
  // Tenant holding the access record written at issuance.
  accessTenant: string;
};

export type EndpointKeyRecord = KeyRecordBase & {
  kind: 'endpoint';
  endpoints: string[];
};

export type QueryKeyRecord = KeyRecordBase & {
  kind: 'query';
  permissions: FieldPermission[];
};

export type KeyRecord = EndpointKeyRecord | QueryKeyRecord;

export type TokenPayload = {
  recordId: number;
  recordKind: KeyKind;
};

export type IssuedToken = {
  token: string;
  verificationHash: string;
};

export type IssuedKey<R extends KeyRecord = KeyRecord> = {
  token: string;
  record: R;
};

export type ScopeSpec =
  | { kind: 'endpoint'; name: string; endpoints: string[] }
  | { kind: 'query'; name: string; operations: FieldPermission[] };

export type DenialReason =
  | 'malformed-token'
  | 'key-not-found'
  | 'user-not-found'
  | 'expired'
  | 'out-of-scope'
  | 'no-query'
  | 'revoked'
  | 'store-unavailable';

export type StoreCallOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type RequestContext = StoreCallOptions & {
  path?: string;
  query?: string;
  // Skips the endpoint path check for callers without a request path.
  bypassScope?: boolean;
};

export type AuthorizationResult =
  | { outcome: 'authorized'; tenant: TenantStore; key: KeyRecord }
  | { outcome: 'denied'; reason: DenialReason };

export type RevokeResult = 'revoked' | 'not-found';

export type KeyDescription = KeyRecord & {
  expiresAt: string;
};
