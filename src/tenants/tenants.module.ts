import { Module } from '@nestjs/common';

import { AdminAuthGuard } from '../access-keys/admin-auth.guard';
import { CacheModule } from '../cache/cache.module';
import { TenantRouter } from './tenant-router.service';
import { TenantsAdminController } from './tenants-admin.controller';

@Module({
  imports: [CacheModule],
  controllers: [TenantsAdminController],
  providers: [TenantRouter, AdminAuthGuard],
  exports: [TenantRouter],
})
export class TenantsModule {}
