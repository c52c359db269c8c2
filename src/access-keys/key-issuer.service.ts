import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { TenantRouter } from '../tenants/tenant-router.service';
import { GRAPHQL_PATH } from './access-keys.constants';
import { InvalidScopeError } from './errors';
import { TokenCodec } from './token-codec';
import type {
  EndpointKeyRecord,
  FieldPermission,
  IssuedKey,
  KeyRecord,
  QueryKeyRecord,
  StoreCallOptions,
} from './types';

type KeyRecordBase = Omit<KeyRecord, 'kind' | 'endpoints' | 'permissions'>;

@Injectable()
export class KeyIssuer {
  private readonly logger = new Logger(KeyIssuer.name);
  private readonly expiresInDays: number;

  constructor(
    private readonly tenantRouter: TenantRouter,
    private readonly tokenCodec: TokenCodec,
    private readonly configService: ConfigService,
  ) {
    this.expiresInDays = this.parsePositiveInteger(
      this.configService.get<unknown>('ACCESS_KEYS_EXPIRES_IN_DAYS'),
      30,
      'ACCESS_KEYS_EXPIRES_IN_DAYS',
    );
  }

  async issueEndpointKey(
    owner: string,
    name: string,
    endpoints: readonly string[] | null | undefined,
    options: StoreCallOptions = {},
  ): Promise<IssuedKey<EndpointKeyRecord>> {
    const scope = this.normalizeEndpoints(endpoints);
    return this.persist(
      owner,
      (base): EndpointKeyRecord => ({ ...base, kind: 'endpoint', endpoints: scope }),
      name,
      options,
    );
  }

  async issueQueryKey(
    owner: string,
    name: string,
    allowedOperations: readonly FieldPermission[] | null | undefined,
    options: StoreCallOptions = {},
  ): Promise<IssuedKey<QueryKeyRecord>> {
    const permissions = this.normalizePermissions(allowedOperations);
    return this.persist(
      owner,
      (base): QueryKeyRecord => ({ ...base, kind: 'query', permissions }),
      name,
      options,
    );
  }

  private async persist<R extends KeyRecord>(
    owner: string,
    build: (base: KeyRecordBase) => R,
    name: string,
    options: StoreCallOptions,
  ): Promise<IssuedKey<R>> {
    const ownerId = owner.trim();
    const ownerTenant = await this.tenantRouter.resolve(ownerId, options);
    const registry = this.tenantRouter.main();
    const id = await registry.nextKeyId(options);

    const record = build({
      id,
      ownerId,
      name: name.trim(),
      createdAt: new Date().toISOString(),
      expiresInDays: this.expiresInDays,
      accessTenant: ownerTenant.name,
    });
    const { token, verificationHash } = this.tokenCodec.issue(record.id, record.kind);

    await this.tenantRouter
      .beginTransaction()
      .putKeyRecord(registry, record)
      .putAccessRecord(ownerTenant, verificationHash)
      .commit(options);

    this.logger.log(
      JSON.stringify({
        event: 'access_key_issued',
        keyId: record.id,
        kind: record.kind,
        tenant: ownerTenant.name,
      }),
    );

    return { token, record };
  }

  private normalizeEndpoints(endpoints: readonly string[] | null | undefined): string[] {
    if (!endpoints || endpoints.length === 0) {
      throw new InvalidScopeError('At least one endpoint is required');
    }

    const normalized: string[] = [];
    for (const endpoint of endpoints) {
      const path = endpoint.trim();
      if (path.length === 0) {
        throw new InvalidScopeError('Endpoints must be non-empty paths');
      }
      if (path === GRAPHQL_PATH) {
        throw new InvalidScopeError(`${GRAPHQL_PATH} requires a query key`);
      }
      if (!normalized.includes(path)) {
        normalized.push(path);
      }
    }
    return normalized;
  }

  private normalizePermissions(
    allowedOperations: readonly FieldPermission[] | null | undefined,
  ): FieldPermission[] {
    if (!allowedOperations || allowedOperations.length === 0) {
      throw new InvalidScopeError('At least one operation permission is required');
    }

    const permissions: FieldPermission[] = [];
    for (const permission of allowedOperations) {
      const operationName = permission.operationName.trim().toLowerCase();
      if (operationName.length === 0) {
        throw new InvalidScopeError('Operation names must be non-empty');
      }
      if (permissions.some((existing) => existing.operationName === operationName)) {
        throw new InvalidScopeError(`Duplicate operation permission: ${operationName}`);
      }

      const allowedFields: string[] = [];
      for (const field of permission.allowedFields) {
        const normalized = field.trim().toLowerCase();
        if (normalized.length > 0 && !allowedFields.includes(normalized)) {
          allowedFields.push(normalized);
        }
      }
      permissions.push({ operationName, allowedFields });
    }
    return permissions;
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
