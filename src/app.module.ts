import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AccessKeysModule } from './access-keys/access-keys.module';
import { CacheModule } from './cache/cache.module';
import { envValidationSchema } from './config/env.validation';
import { GatewayModule } from './gateway/gateway.module';
import { HealthModule } from './health/health.module';
import { TenantsModule } from './tenants/tenants.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      cache: true,
      validationSchema: envValidationSchema,
      validationOptions: {
        abortEarly: false,
      },
    }),
    CacheModule,
    HealthModule,
    TenantsModule,
    AccessKeysModule,
    GatewayModule,
  ],
})
export class AppModule {}
