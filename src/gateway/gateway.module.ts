import { Module } from '@nestjs/common';

import { AccessKeysModule } from '../access-keys/access-keys.module';
import { GatewayController } from './gateway.controller';

@Module({
  imports: [AccessKeysModule],
  controllers: [GatewayController],
})
export class GatewayModule {}
