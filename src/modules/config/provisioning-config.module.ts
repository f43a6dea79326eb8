import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { buildProvisioningConfig, PROVISIONING_CONFIG } from './provisioning-config';

@Global()
@Module({
  providers: [
    {
      provide: PROVISIONING_CONFIG,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => buildProvisioningConfig(config),
    },
  ],
  exports: [PROVISIONING_CONFIG],
})
export class ProvisioningConfigModule {}
