import { ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { createConfigService } from '../../test/support/in-memory-redis';
import { hashKeyForLogging } from '../utils/hash';
import { AdminAuthGuard } from './admin-auth.guard';

describe('AdminAuthGuard', () => {
  const adminToken = 'test-admin-token';

  const buildContext = (request: Record<string, unknown>): ExecutionContext =>
    ({
      switchToHttp: () => ({
        getRequest: () => request,
      }),
    }) as unknown as ExecutionContext;

  const buildGuard = (token: string = adminToken) =>
    new AdminAuthGuard(
      createConfigService({ ADMIN_API_TOKEN: token }) as unknown as ConfigService,
    );

  it('sets a hashed adminIdentity on success', () => {
    const request: Record<string, unknown> = {
      headers: { authorization: `Bearer ${adminToken}` },
    };

    expect(buildGuard().canActivate(buildContext(request))).toBe(true);
    expect(request.adminIdentity).toBe(`token:${hashKeyForLogging(adminToken)}`);
    expect(String(request.adminIdentity)).not.toContain(adminToken);
  });

  it('accepts the scheme in any case', () => {
    const request = { headers: { authorization: `bearer ${adminToken}` } };

    expect(buildGuard().canActivate(buildContext(request))).toBe(true);
  });

  it.each([
    ['a wrong token', 'Bearer invalid-token'],
    ['a token of another length', `Bearer ${adminToken}x`],
    ['another scheme', `Basic ${adminToken}`],
    ['no header', undefined],
  ])('rejects %s', (_label, authorization) => {
    const request: Record<string, unknown> = { headers: { authorization } };

    expect(() => buildGuard().canActivate(buildContext(request))).toThrow(UnauthorizedException);
    expect(request.adminIdentity).toBeUndefined();
  });

  it('accepts every configured token during a rotation', () => {
    const guard = buildGuard(`test-old-token, ${adminToken}`);

    for (const token of ['test-old-token', adminToken]) {
      const request = { headers: { authorization: `Bearer ${token}` } };
      expect(guard.canActivate(buildContext(request))).toBe(true);
    }
  });

  it('rejects everything while no admin token is configured', () => {
    const request = { headers: { authorization: 'Bearer ' } };

    expect(() => buildGuard('').canActivate(buildContext(request))).toThrow(
      'Admin token is not configured',
    );
  });
});
