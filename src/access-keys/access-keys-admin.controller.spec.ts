import {
  BadRequestException,
  Logger,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';

import { AccessKeysAdminController } from './access-keys-admin.controller';
import { AccessKeysService } from './access-keys.service';
import type { RequestWithAdminIdentity } from './admin-auth.guard';
import { ENDPOINT_REGISTRY } from './endpoint-registry';
import {
  InvalidScopeError,
  KeyNotFoundError,
  StoreUnavailableError,
  TenantNotFoundError,
} from './errors';
import type { EndpointKeyRecord } from './types';

describe('AccessKeysAdminController', () => {
  const record: EndpointKeyRecord = {
    id: 7,
    kind: 'endpoint',
    ownerId: 'user-1',
    name: 'orders',
    createdAt: '2026-01-01T00:00:00.000Z',
    expiresInDays: 30,
    accessTenant: 'alpha',
    endpoints: ['/orders'],
  };

  const request = {
    headers: { 'x-request-id': 'req-1' },
    ip: '127.0.0.1',
    adminIdentity: 'token:abc',
  } as unknown as RequestWithAdminIdentity;

  let service: {
    issueKey: jest.Mock;
    listKeys: jest.Mock;
    describeKey: jest.Mock;
    revoke: jest.Mock;
  };
  let controller: AccessKeysAdminController;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    service = {
      issueKey: jest.fn(async () => ({ token: 'test-token', record })),
      listKeys: jest.fn(async () => []),
      describeKey: jest.fn(),
      revoke: jest.fn(async () => 'revoked'),
    };
    controller = new AccessKeysAdminController(service as unknown as AccessKeysService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('issue', () => {
    it('issues an endpoint key and audits without the token', async () => {
      await expect(
        controller.issue(request, {
          owner: ' user-1 ',
          name: 'orders',
          kind: 'endpoint',
          endpoints: ['/orders'],
        }),
      ).resolves.toEqual({ token: 'test-token', record });

      expect(service.issueKey).toHaveBeenCalledWith('user-1', {
        kind: 'endpoint',
        name: 'orders',
        endpoints: ['/orders'],
      });
      expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
        event: 'admin_access_key_audit',
        action: 'issue',
        result: 'ok',
        adminIdentity: 'token:abc',
        ip: '127.0.0.1',
        requestId: 'req-1',
        keyId: 7,
        kind: 'endpoint',
        owner: 'user-1',
      });
    });

    it('parses query operations', async () => {
      await controller.issue(request, {
        owner: 'user-1',
        name: 'reader',
        kind: 'query',
        operations: [{ operationName: 'users', allowedFields: ['id'] }],
      });

      expect(service.issueKey).toHaveBeenCalledWith('user-1', {
        kind: 'query',
        name: 'reader',
        operations: [{ operationName: 'users', allowedFields: ['id'] }],
      });
    });

    const invalidBodies: Array<[string, Record<string, unknown>]> = [
      ['a missing owner', { name: 'x', kind: 'endpoint', endpoints: ['/a'] }],
      ['an unknown kind', { owner: 'u', name: 'x', kind: 'admin' }],
      ['non-string endpoints', { owner: 'u', name: 'x', kind: 'endpoint', endpoints: [1] }],
      ['a non-object operation', { owner: 'u', name: 'x', kind: 'query', operations: ['users'] }],
    ];

    it.each(invalidBodies)('rejects %s', async (_label, body) => {
      await expect(controller.issue(request, body)).rejects.toBeInstanceOf(BadRequestException);
      expect(service.issueKey).not.toHaveBeenCalled();
    });

    it.each([
      [new InvalidScopeError('empty'), BadRequestException],
      [new TenantNotFoundError('none'), NotFoundException],
      [new StoreUnavailableError('down'), ServiceUnavailableException],
    ])('maps %s to an HTTP error', async (error, expected) => {
      service.issueKey.mockRejectedValueOnce(error);

      await expect(
        controller.issue(request, { owner: 'u', name: 'x', kind: 'endpoint', endpoints: ['/a'] }),
      ).rejects.toBeInstanceOf(expected);
    });
  });

  it('requires an owner to list keys', async () => {
    await expect(controller.list(request, undefined)).rejects.toBeInstanceOf(BadRequestException);
    await expect(controller.list(request, 'user-1')).resolves.toEqual({ items: [] });
  });

  it('serves the endpoint registry', () => {
    expect(controller.listEndpoints()).toEqual({ items: ENDPOINT_REGISTRY });
  });

  it('hides keys the requester does not own', async () => {
    service.describeKey.mockRejectedValueOnce(new KeyNotFoundError('missing'));

    await expect(
      controller.describe(request, { token: 'test-token', requesterId: 'user-2' }),
    ).rejects.toThrow(new NotFoundException('API key not found'));
  });

  it('revokes keys and reports unknown ones as 404', async () => {
    await expect(controller.revoke(request, { token: 'test-token' })).resolves.toEqual({
      ok: true,
    });

    service.revoke.mockResolvedValueOnce('not-found');
    await expect(controller.revoke(request, { token: 'test-token' })).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });
});
