import { Module } from '@nestjs/common';

import { CacheModule } from '../cache/cache.module';
import { TenantsModule } from '../tenants/tenants.module';
import { HealthController } from './health.controller';

@Module({
  imports: [CacheModule, TenantsModule],
  controllers: [HealthController],
})
export class HealthModule {}
