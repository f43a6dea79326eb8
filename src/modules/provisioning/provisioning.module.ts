import { Module, type DynamicModule } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { PROVISIONING_CONFIG, type ProvisioningConfig } from '../config/provisioning-config';
import { ProvisioningLogger } from '../logging/provisioning-logger.service';
import { PolicyModule } from '../policy/policy.module';
import { GroupResolver } from './group-resolver.service';
import { LicenseAllocator } from './license-allocator.service';
import { OPERATOR_PROMPT, selectOperatorPrompt } from './operator-prompt';
import { ProvisioningDelays } from './provisioning-delays';
import { ProvisioningOrchestrator } from './provisioning-orchestrator.service';
import { loadSkuCatalog, SKU_CATALOG } from './sku-catalog';

export interface ProvisioningModuleOptions {
  /** stdin is a terminal that has not been consumed by the ticket itself. */
  interactive?: boolean;
}

/**
 * Directory-side provisioning: uniqueness check, creation and the attachment
 * steps. Expects DIRECTORY_GATEWAY and PROVISIONING_CONFIG from global modules.
 */
@Module({})
export class ProvisioningModule {
  static register(options: ProvisioningModuleOptions = {}): DynamicModule {
    const interactive = options.interactive ?? false;
    return {
      module: ProvisioningModule,
      imports: [PolicyModule],
      providers: [
        GroupResolver,
        LicenseAllocator,
        ProvisioningDelays,
        ProvisioningOrchestrator,
        {
          provide: SKU_CATALOG,
          inject: [ConfigService],
          useFactory: (config: ConfigService) => loadSkuCatalog(config.get<string>('SKU_NAMES_FILE') || undefined),
        },
        {
          provide: OPERATOR_PROMPT,
          inject: [PROVISIONING_CONFIG, ProvisioningLogger],
          useFactory: (config: ProvisioningConfig, logger: ProvisioningLogger) =>
            selectOperatorPrompt(config, logger, interactive),
        },
      ],
      exports: [ProvisioningOrchestrator],
    };
  }
}
