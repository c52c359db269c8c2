import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { CryptoService } from '../crypto/crypto.service';
import { TenantsModule } from '../tenants/tenants.module';
import { AccessEvaluator } from './access-evaluator.service';
import { ACCESS_KEYS_SECRET } from './access-keys.constants';
import { AccessKeysService } from './access-keys.service';
import { AccessKeysAdminController } from './access-keys-admin.controller';
import { AdminAuthGuard } from './admin-auth.guard';
import { ApiKeyAccessGuard } from './api-key-access.guard';
import { KeyIssuer } from './key-issuer.service';
import { TokenCodec } from './token-codec';

@Module({
  imports: [TenantsModule],
  controllers: [AccessKeysAdminController],
  providers: [
    {
      provide: ACCESS_KEYS_SECRET,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): string => {
        const secret = configService.get<string>('ACCESS_KEYS_SECRET') ?? '';
        if (secret.length === 0) {
          throw new Error('ACCESS_KEYS_SECRET is not configured');
        }
        return secret;
      },
    },
    CryptoService,
    TokenCodec,
    KeyIssuer,
    AccessEvaluator,
    AccessKeysService,
    ApiKeyAccessGuard,
    AdminAuthGuard,
  ],
  exports: [AccessKeysService, ApiKeyAccessGuard],
})
export class AccessKeysModule {}
