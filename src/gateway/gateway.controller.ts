import {
  Body,
  Controller,
  Get,
  HttpCode,
  Post,
  Req,
  UnauthorizedException,
  UseGuards,
} from '@nestjs/common';

import { GRAPHQL_PATH } from '../access-keys/access-keys.constants';
import {
  ApiKeyAccessGuard,
  RequestWithTenantAccess,
  TenantAccess,
} from '../access-keys/api-key-access.guard';
import { extractQueryFields } from '../access-keys/query-field-extractor';
import type { KeyKind } from '../access-keys/types';

type WhoAmIResponse = {
  tenant: string;
  keyId: number;
  kind: KeyKind;
  ownerId: string;
};

type GraphqlBody = {
  query?: unknown;
};

/**
 * Key-protected surface. Downstream handlers would use the resolved tenant
 * store; these routes report what the guard resolved.
 */
@Controller()
@UseGuards(ApiKeyAccessGuard)
export class GatewayController {
  @Get('api/whoami')
  whoAmI(@Req() request: RequestWithTenantAccess): WhoAmIResponse {
    const { tenant, key } = this.requireAccess(request);
    return { tenant: tenant.name, keyId: key.id, kind: key.kind, ownerId: key.ownerId };
  }

  @Post(GRAPHQL_PATH.slice(1))
  @HttpCode(200)
  graphql(
    @Req() request: RequestWithTenantAccess,
    @Body() body: GraphqlBody,
  ): { tenant: string; operations: Record<string, string[]> } {
    const { tenant } = this.requireAccess(request);
    const query = typeof body?.query === 'string' ? body.query : '';
    return { tenant: tenant.name, operations: Object.fromEntries(extractQueryFields(query)) };
  }

  private requireAccess(request: RequestWithTenantAccess): TenantAccess {
    if (!request.tenantAccess) {
      throw new UnauthorizedException('Invalid API key');
    }
    return request.tenantAccess;
  }
}
