import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { loadProvisioningPolicy, PROVISIONING_POLICY } from './provisioning-policy';
import { ProvisioningPolicyService } from './provisioning-policy.service';

@Module({
  providers: [
    {
      provide: PROVISIONING_POLICY,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        loadProvisioningPolicy(config.get<string>('PROVISIONING_POLICY_FILE') || undefined),
    },
    ProvisioningPolicyService,
  ],
  exports: [ProvisioningPolicyService],
})
export class PolicyModule {}
