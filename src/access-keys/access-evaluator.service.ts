import { Injectable, Logger } from '@nestjs/common';

import { TenantRouter } from '../tenants/tenant-router.service';
import type { TenantStore } from '../tenants/tenant-store';
import { hashKeyForLogging } from '../utils/hash';
import { GRAPHQL_PATH } from './access-keys.constants';
import {
  AccessKeyError,
  ExpiredError,
  KeyNotFoundError,
  OutOfScopeError,
  RevokedError,
  UnknownTenantError,
} from './errors';
import { isKeyExpired } from './key-record';
import { extractQueryFields } from './query-field-extractor';
import { TokenCodec } from './token-codec';
import type {
  AuthorizationResult,
  DenialReason,
  EndpointKeyRecord,
  KeyRecord,
  QueryKeyRecord,
  RequestContext,
  StoreCallOptions,
} from './types';

/**
 * One authorization pass over durable state:
 * decode -> load key -> resolve owner tenant -> expiry -> scope -> revocation.
 * The first failing step decides the denial; later steps never run. A key
 * whose record was deleted by revocation denies as revoked.
 */
@Injectable()
export class AccessEvaluator {
  private readonly logger = new Logger(AccessEvaluator.name);

  constructor(
    private readonly tenantRouter: TenantRouter,
    private readonly tokenCodec: TokenCodec,
  ) {}

  async evaluate(token: string, context: RequestContext = {}): Promise<AuthorizationResult> {
    const options: StoreCallOptions = { timeoutMs: context.timeoutMs, signal: context.signal };

    try {
      const payload = this.tokenCodec.decode(token);

      const registry = this.tenantRouter.main();
      const key = await registry.getKeyRecord(payload.recordKind, payload.recordId, options);
      if (!key) {
        if (await registry.isRevoked(payload.recordKind, payload.recordId, options)) {
          throw new RevokedError(`Key ${payload.recordId} was revoked`);
        }
        throw new KeyNotFoundError(`No ${payload.recordKind} key with id ${payload.recordId}`);
      }

      const tenant = await this.tenantRouter.resolve(key.ownerId, options);

      if (isKeyExpired(key)) {
        throw new ExpiredError(`Key ${key.id} expired`);
      }

      this.checkScope(key, context);
      await this.checkRevocation(token, tenant, options);

      this.logger.debug(
        JSON.stringify({ event: 'access_authorized', keyId: key.id, tenant: tenant.name }),
      );
      return { outcome: 'authorized', tenant, key };
    } catch (error) {
      if (error instanceof UnknownTenantError) {
        // Main registry missing from configuration; nothing can be served.
        return this.deny(token, 'store-unavailable', error.message);
      }
      if (error instanceof AccessKeyError && isDenialReason(error.reason)) {
        return this.deny(token, error.reason, error.message);
      }
      throw error;
    }
  }

  private checkScope(key: KeyRecord, context: RequestContext): void {
    switch (key.kind) {
      case 'endpoint':
        this.checkEndpointScope(key, context);
        return;
      case 'query':
        this.checkQueryScope(key, context);
        return;
    }
  }

  private checkEndpointScope(key: EndpointKeyRecord, context: RequestContext): void {
    const path = context.path;
    // Field-level scope on GraphQL needs a query key, even for older records.
    if (path === GRAPHQL_PATH) {
      throw new OutOfScopeError(`${GRAPHQL_PATH} requires a query key`);
    }
    if (context.bypassScope) {
      return;
    }
    if (!path) {
      throw new OutOfScopeError('Request path is required for endpoint keys');
    }
    if (!key.endpoints.includes(path)) {
      throw new OutOfScopeError(`Path ${path} is outside key scope`);
    }
  }

  private checkQueryScope(key: QueryKeyRecord, context: RequestContext): void {
    const requested = extractQueryFields(context.query ?? '');
    if (requested.size === 0) {
      throw new OutOfScopeError('No query operations to authorize', 'no-query');
    }

    for (const [operation, fields] of requested) {
      const operationName = operation.toLowerCase();
      const permission = key.permissions.find(
        (candidate) => candidate.operationName.toLowerCase() === operationName,
      );
      if (!permission) {
        throw new OutOfScopeError(`Operation ${operation} is not permitted`);
      }

      const allowed = new Set(permission.allowedFields.map((field) => field.toLowerCase()));
      const denied = fields.find((field) => !allowed.has(field.toLowerCase()));
      if (denied !== undefined) {
        throw new OutOfScopeError(`Field ${denied} is not permitted for ${operation}`);
      }
    }
  }

  private async checkRevocation(
    token: string,
    tenant: TenantStore,
    options: StoreCallOptions,
  ): Promise<void> {
    const present = await tenant.hasAccessRecord(this.tokenCodec.verificationHash(token), options);
    if (!present) {
      throw new RevokedError('Access record not found');
    }
  }

  private deny(token: string, reason: DenialReason, detail: string): AuthorizationResult {
    this.logger.warn(
      JSON.stringify({
        event: 'access_denied',
        reason,
        detail,
        tokenHash: hashKeyForLogging(token),
      }),
    );
    return { outcome: 'denied', reason };
  }
}

const DENIAL_REASONS: ReadonlySet<string> = new Set<DenialReason>([
  'malformed-token',
  'key-not-found',
  'user-not-found',
  'expired',
  'out-of-scope',
  'no-query',
  'revoked',
  'store-unavailable',
]);

function isDenialReason(reason: string): reason is DenialReason {
  return DENIAL_REASONS.has(reason);
}
