import { Inject, Injectable } from '@nestjs/common';
import { setTimeout as sleep } from 'node:timers/promises';

import { PROVISIONING_CONFIG, type ProvisioningConfig } from '../config/provisioning-config';
import { LogCategory } from '../logging/log-levels';
import { ProvisioningLogger } from '../logging/provisioning-logger.service';

/**
 * Waits inserted by the orchestrator. `waitForPropagation` covers the
 * directory's read-after-write window before the phone step; `pace` is
 * display pacing only. Both are no-ops at 0 ms.
 */
@Injectable()
export class ProvisioningDelays {
  constructor(
    @Inject(PROVISIONING_CONFIG) private readonly config: ProvisioningConfig,
    private readonly logger: ProvisioningLogger,
  ) {}

  async waitForPropagation(): Promise<void> {
    const ms = this.config.propagationDelayMs;
    if (ms <= 0) return;
    this.logger.info(LogCategory.ORCHESTRATOR, `Waiting ${ms} ms for directory propagation`);
    await sleep(ms);
  }

  async pace(): Promise<void> {
    if (this.config.pacingDelayMs > 0) {
      await sleep(this.config.pacingDelayMs);
    }
  }
}
