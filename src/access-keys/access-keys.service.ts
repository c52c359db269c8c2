import { Injectable, Logger } from '@nestjs/common';

import { TenantRouter } from '../tenants/tenant-router.service';
import type { TenantStore } from '../tenants/tenant-store';
import { hashKeyForLogging } from '../utils/hash';
import { AccessEvaluator } from './access-evaluator.service';
import {
  DecryptionError,
  KeyNotFoundError,
  MalformedTokenError,
  UnknownTenantError,
} from './errors';
import { KeyIssuer } from './key-issuer.service';
import { keyExpiresAt } from './key-record';
import { TokenCodec } from './token-codec';
import type {
  AuthorizationResult,
  IssuedKey,
  KeyDescription,
  KeyRecord,
  RequestContext,
  RevokeResult,
  ScopeSpec,
  StoreCallOptions,
  TokenPayload,
} from './types';

/** Entry point for the HTTP layer: issue, authorize, revoke and inspect keys. */
@Injectable()
export class AccessKeysService {
  private readonly logger = new Logger(AccessKeysService.name);

  constructor(
    private readonly keyIssuer: KeyIssuer,
    private readonly accessEvaluator: AccessEvaluator,
    private readonly tokenCodec: TokenCodec,
    private readonly tenantRouter: TenantRouter,
  ) {}

  async issueKey(owner: string, scope: ScopeSpec, options?: StoreCallOptions): Promise<IssuedKey> {
    switch (scope.kind) {
      case 'endpoint':
        return this.keyIssuer.issueEndpointKey(owner, scope.name, scope.endpoints, options);
      case 'query':
        return this.keyIssuer.issueQueryKey(owner, scope.name, scope.operations, options);
    }
  }

  async authorize(token: string, context: RequestContext = {}): Promise<AuthorizationResult> {
    return this.accessEvaluator.evaluate(token, context);
  }

  /**
   * Deletes the key record and every access record of the token in one
   * transaction, so the next authorization sees it as revoked.
   */
  async revoke(token: string, options: StoreCallOptions = {}): Promise<RevokeResult> {
    const payload = this.decodeOrThrow(token);
    const registry = this.tenantRouter.main();
    const record = await registry.getKeyRecord(payload.recordKind, payload.recordId, options);
    if (!record) {
      return 'not-found';
    }

    const verificationHash = this.tokenCodec.verificationHash(token);
    const transaction = this.tenantRouter.beginTransaction().removeKeyRecord(registry, record);
    for (const store of await this.accessRecordStores(record, options)) {
      transaction.removeAccessRecord(store, verificationHash);
    }
    await transaction.commit(options);

    this.logger.log(
      JSON.stringify({
        event: 'access_key_revoked',
        keyId: record.id,
        kind: record.kind,
        tokenHash: hashKeyForLogging(token),
      }),
    );
    return 'revoked';
  }

  /** Key details for its owner; anyone else gets {@link KeyNotFoundError}. */
  async describeKey(
    token: string,
    requesterId: string,
    options: StoreCallOptions = {},
  ): Promise<KeyDescription> {
    const payload = this.decodeOrThrow(token);
    const record = await this.tenantRouter
      .main()
      .getKeyRecord(payload.recordKind, payload.recordId, options);
    if (!record || record.ownerId !== requesterId.trim()) {
      throw new KeyNotFoundError('API key not found');
    }

    return { ...record, expiresAt: keyExpiresAt(record).toISOString() };
  }

  async listKeys(ownerId: string, options: StoreCallOptions = {}): Promise<KeyDescription[]> {
    const records = await this.tenantRouter.main().listKeyRecords(ownerId.trim(), options);
    return records.map((record) => ({
      ...record,
      expiresAt: keyExpiresAt(record).toISOString(),
    }));
  }

  private decodeOrThrow(token: string): TokenPayload {
    try {
      return this.tokenCodec.decode(token);
    } catch (error) {
      if (error instanceof DecryptionError) {
        throw new MalformedTokenError('Token could not be decoded', { cause: error });
      }
      throw error;
    }
  }

  // The issuing tenant and the owner's current tenant can differ after reassignment.
  private async accessRecordStores(
    record: KeyRecord,
    options: StoreCallOptions,
  ): Promise<TenantStore[]> {
    const names = new Set<string>([record.accessTenant]);
    const current = await this.tenantRouter.getAssignment(record.ownerId, options);
    if (current) {
      names.add(current);
    }

    const stores: TenantStore[] = [];
    for (const name of names) {
      try {
        stores.push(this.tenantRouter.open(name));
      } catch (error) {
        if (!(error instanceof UnknownTenantError)) {
          throw error;
        }
        this.logger.warn(`Skipping access record cleanup in unconfigured tenant ${name}`);
      }
    }
    return stores;
  }
}
