import {
  CanActivate,
  ExecutionContext,
  HttpException,
  Injectable,
  ServiceUnavailableException,
  UnauthorizedException,
} from '@nestjs/common';
import type { FastifyRequest } from 'fastify';

import type { TenantStore } from '../tenants/tenant-store';
import { ACCESS_KEY_HEADER } from './access-keys.constants';
import { AccessKeysService } from './access-keys.service';
import type { KeyRecord, RequestContext } from './types';

export type TenantAccess = {
  tenant: TenantStore;
  key: KeyRecord;
};

export type RequestWithTenantAccess = FastifyRequest & {
  tenantAccess?: TenantAccess;
};

/**
 * Authorizes `x-api-key` against the request path (endpoint keys) or the
 * GraphQL document in the body (query keys). Every denial looks the same to
 * the client.
 */
@Injectable()
export class ApiKeyAccessGuard implements CanActivate {
  constructor(private readonly accessKeysService: AccessKeysService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<RequestWithTenantAccess>();
    const header = request.headers[ACCESS_KEY_HEADER];
    const token = (Array.isArray(header) ? header[0] : header)?.trim();
    if (!token) {
      throw new UnauthorizedException('Invalid API key');
    }

    try {
      const result = await this.accessKeysService.authorize(token, this.buildContext(request));
      if (result.outcome === 'authorized') {
        request.tenantAccess = { tenant: result.tenant, key: result.key };
        return true;
      }

      if (result.reason === 'store-unavailable') {
        throw new ServiceUnavailableException('API access validation failed');
      }
      throw new UnauthorizedException('Invalid API key');
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }

      throw new ServiceUnavailableException('API access validation failed');
    }
  }

  private buildContext(request: FastifyRequest): RequestContext {
    const [path] = request.url.split('?');
    return {
      path,
      query: this.readQuery(request.body),
    };
  }

  private readQuery(body: unknown): string | undefined {
    if (typeof body !== 'object' || body === null || !('query' in body)) {
      return undefined;
    }

    return typeof body.query === 'string' ? body.query : undefined;
  }
}
