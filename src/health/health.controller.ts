import { Controller, Get } from '@nestjs/common';

import { CacheService } from '../cache/cache.service';
import { TenantRouter } from '../tenants/tenant-router.service';

type StoreHealth = {
  status: 'ok' | 'degraded';
  message?: string;
  tenants: string[];
};

@Controller('health')
export class HealthController {
  constructor(
    private readonly cacheService: CacheService,
    private readonly tenantRouter: TenantRouter,
  ) {}

  @Get()
  getHealth(): { status: 'ok' } {
    return { status: 'ok' };
  }

  // Degraded means every authorization currently denies with store-unavailable.
  @Get('store')
  async getStoreHealth(): Promise<StoreHealth> {
    const { status, message } = await this.cacheService.checkHealth();
    return { status, message, tenants: this.tenantRouter.listTenants() };
  }
}
