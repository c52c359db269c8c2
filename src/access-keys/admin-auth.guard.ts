import { timingSafeEqual } from 'node:crypto';

import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { FastifyRequest } from 'fastify';

import { hashKeyForLogging, sha256Hex } from '../utils/hash';

export type RequestWithAdminIdentity = FastifyRequest & {
  adminIdentity?: string;
};

/**
 * Bearer auth for the internal admin API. `ADMIN_API_TOKEN` may list several
 * comma-separated tokens so one can be rotated out without downtime.
 */
@Injectable()
export class AdminAuthGuard implements CanActivate {
  private readonly tokenDigests: Buffer[];

  constructor(configService: ConfigService) {
    this.tokenDigests = (configService.get<string>('ADMIN_API_TOKEN') ?? '')
      .split(',')
      .map((token) => token.trim())
      .filter((token) => token.length > 0)
      .map(digest);
  }

  canActivate(context: ExecutionContext): boolean {
    if (this.tokenDigests.length === 0) {
      throw new UnauthorizedException('Admin token is not configured');
    }

    const request = context.switchToHttp().getRequest<RequestWithAdminIdentity>();
    const token = readBearer(request.headers.authorization);
    if (!token || !this.isConfigured(token)) {
      throw new UnauthorizedException('Invalid admin token');
    }

    request.adminIdentity = `token:${hashKeyForLogging(token)}`;
    return true;
  }

  private isConfigured(token: string): boolean {
    const candidate = digest(token);
    let matched = false;
    for (const expected of this.tokenDigests) {
      matched = timingSafeEqual(candidate, expected) || matched;
    }
    return matched;
  }
}

function digest(token: string): Buffer {
  return Buffer.from(sha256Hex(token), 'hex');
}

function readBearer(header: string | string[] | undefined): string | null {
  const value = Array.isArray(header) ? header[0] : header;
  const [scheme, token] = (value ?? '').split(' ');
  if (!scheme || !token || scheme.toLowerCase() !== 'bearer') {
    return null;
  }

  return token;
}
