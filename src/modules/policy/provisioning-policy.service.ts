import { Inject, Injectable } from '@nestjs/common';

import type { UserRecord } from '../../domain/models/user-record.model';
import { ProvisioningLogger } from '../logging/provisioning-logger.service';
import { LogCategory } from '../logging/log-levels';
import { matchesCondition, PROVISIONING_POLICY, type ProvisioningPolicy } from './provisioning-policy';

/**
 * Org-specific eligibility rules: which extra groups a new user joins and
 * which license SKUs they need.
 */
@Injectable()
export class ProvisioningPolicyService {
  constructor(
    @Inject(PROVISIONING_POLICY) private readonly policy: ProvisioningPolicy,
    private readonly logger: ProvisioningLogger,
  ) {}

  /**
   * Append policy groups to `record.requestedGroups`, skipping names already
   * requested (case-insensitive). Returns the names that were appended.
   */
  applyGroupPolicy(record: UserRecord): string[] {
    const seen = new Set(record.requestedGroups.map((g) => g.toLowerCase()));
    const appended: string[] = [];

    for (const rule of this.policy.groupRules) {
      if (!matchesCondition(record, rule.when)) continue;
      for (const group of rule.groups) {
        if (seen.has(group.toLowerCase())) continue;
        seen.add(group.toLowerCase());
        record.requestedGroups.push(group);
        appended.push(group);
      }
    }

    if (appended.length > 0) {
      this.logger.debug(LogCategory.POLICY, 'Policy groups appended', { groups: appended });
    }
    return appended;
  }

  /** SKU part numbers required for this record, in rule order, without duplicates. */
  requiredSkus(record: UserRecord): string[] {
    const skus = new Set<string>();
    for (const rule of this.policy.licenseRules) {
      if (matchesCondition(record, rule.when)) {
        rule.skus.forEach((sku) => skus.add(sku));
      }
    }
    this.logger.debug(LogCategory.POLICY, 'License policy evaluated', { skus: [...skus] });
    return [...skus];
  }
}
