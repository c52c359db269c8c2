import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpException,
  Logger,
  NotFoundException,
  Param,
  Put,
  Req,
  ServiceUnavailableException,
  UseGuards,
} from '@nestjs/common';

import { AdminAuthGuard, RequestWithAdminIdentity } from '../access-keys/admin-auth.guard';
import {
  StoreUnavailableError,
  TenantNotFoundError,
  UnknownTenantError,
} from '../access-keys/errors';
import { TenantRouter } from './tenant-router.service';

type AssignTenantBody = {
  tenant?: unknown;
};

@Controller('internal/tenants')
@UseGuards(AdminAuthGuard)
export class TenantsAdminController {
  private readonly logger = new Logger(TenantsAdminController.name);

  constructor(private readonly tenantRouter: TenantRouter) {}

  @Get()
  list(): { items: string[] } {
    return { items: this.tenantRouter.listTenants() };
  }

  @Get('users/:userId')
  async getAssignment(
    @Param('userId') userId: string,
  ): Promise<{ userId: string; tenant: string }> {
    const normalized = this.parseUserId(userId);

    try {
      const tenant = await this.tenantRouter.getAssignment(normalized);
      if (!tenant) {
        throw new TenantNotFoundError('No tenant assigned to user');
      }
      return { userId: normalized, tenant };
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  @Put('users/:userId')
  async assign(
    @Req() request: RequestWithAdminIdentity,
    @Param('userId') userId: string,
    @Body() body: AssignTenantBody,
  ): Promise<{ userId: string; tenant: string }> {
    const normalized = this.parseUserId(userId);
    const tenant = typeof body?.tenant === 'string' ? body.tenant.trim() : '';
    if (tenant.length === 0) {
      throw new BadRequestException('tenant is required');
    }

    try {
      await this.tenantRouter.setTenant(normalized, tenant);
    } catch (error) {
      this.logger.warn(
        JSON.stringify({
          event: 'admin_tenant_audit',
          action: 'assign',
          result: 'error',
          adminIdentity: request.adminIdentity ?? 'unknown',
          tenant,
          reason: error instanceof Error ? error.name : 'UnknownError',
        }),
      );
      throw this.toHttpException(error);
    }

    this.logger.log(
      JSON.stringify({
        event: 'admin_tenant_audit',
        action: 'assign',
        result: 'ok',
        adminIdentity: request.adminIdentity ?? 'unknown',
        tenant,
      }),
    );
    return { userId: normalized, tenant };
  }

  private parseUserId(value: string): string {
    const normalized = value?.trim();
    if (!normalized) {
      throw new BadRequestException('userId is required');
    }

    return normalized;
  }

  private toHttpException(error: unknown): unknown {
    if (error instanceof HttpException) {
      return error;
    }
    if (error instanceof UnknownTenantError) {
      return new BadRequestException(error.message);
    }
    if (error instanceof TenantNotFoundError) {
      return new NotFoundException('No tenant assigned to user');
    }
    if (error instanceof StoreUnavailableError) {
      return new ServiceUnavailableException('Tenant directory unavailable');
    }
    return error;
  }
}
