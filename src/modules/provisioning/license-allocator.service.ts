import { Inject, Injectable } from '@nestjs/common';

import type { IDirectoryGateway } from '../../domain/directory/directory-gateway.interface';
import { DIRECTORY_GATEWAY } from '../../domain/directory/directory.tokens';
import { createProvisioningError, describeError, PROVISIONING_ERROR_KIND } from '../../domain/errors/provisioning-error';
import type { LicenseDecision, LicenseOutcome, SkuAvailability } from '../../domain/models/provisioning-result.model';
import { LogCategory } from '../logging/log-levels';
import { ProvisioningLogger } from '../logging/provisioning-logger.service';
import { SKU_CATALOG, SkuCatalog } from './sku-catalog';

export const NO_LICENSE_POLICY_MATCHED = 'No license policy matched this user';

/**
 * LicenseAllocator: checks tenant seat counts for the SKUs a user needs and
 * assigns every SKU that still has a free seat in a single call.
 */
@Injectable()
export class LicenseAllocator {
  constructor(
    @Inject(DIRECTORY_GATEWAY) private readonly directory: IDirectoryGateway,
    @Inject(SKU_CATALOG) private readonly catalog: SkuCatalog,
    private readonly logger: ProvisioningLogger,
  ) {}

  /** Read current seat counts for the required SKU part numbers. */
  async decide(requiredSkus: readonly string[]): Promise<LicenseDecision> {
    const required = new Set(requiredSkus.map((sku) => sku.toUpperCase()));
    const availability = new Map<string, SkuAvailability>();

    for (const sku of await this.directory.listSubscribedSkus()) {
      const code = sku.skuPartNumber.toUpperCase();
      if (!required.has(code)) continue;
      availability.set(code, {
        skuId: sku.skuId,
        available: sku.prepaidUnits.enabled - sku.consumedUnits,
        total: sku.prepaidUnits.enabled,
      });
    }

    this.logger.debug(LogCategory.LICENSE, 'Seat counts read', {
      availability: Object.fromEntries(availability),
    });
    return { requiredSkus: required, availability };
  }

  /**
   * One outcome per required SKU, in the order given. Rejects with
   * PolicyMismatch, before any directory call, when nothing is required.
   */
  async allocate(userId: string, requiredSkus: readonly string[]): Promise<LicenseOutcome[]> {
    if (requiredSkus.length === 0) {
      throw createProvisioningError({ kind: PROVISIONING_ERROR_KIND.POLICY_MISMATCH, detail: NO_LICENSE_POLICY_MATCHED });
    }

    const decision = await this.decide(requiredSkus);
    const outcomes: LicenseOutcome[] = [];
    const payload: Array<{ skuId: string; outcome: LicenseOutcome }> = [];

    for (const code of decision.requiredSkus) {
      const skuLabel = this.catalog.label(code);
      const seats = decision.availability.get(code);

      if (!seats) {
        outcomes.push({ skuLabel, succeeded: false, reason: 'Tenant has no subscription for this SKU' });
        continue;
      }
      if (seats.available <= 0) {
        this.logger.warn(LogCategory.LICENSE, 'No seats left', { sku: code, total: seats.total });
        outcomes.push({
          skuLabel,
          succeeded: false,
          reason: `${PROVISIONING_ERROR_KIND.EXHAUSTED}: all ${seats.total} seats in use`,
        });
        continue;
      }

      const outcome: LicenseOutcome = { skuLabel, succeeded: true, reason: '' };
      outcomes.push(outcome);
      payload.push({ skuId: seats.skuId, outcome });
    }

    if (payload.length > 0) {
      try {
        await this.directory.assignLicenses(userId, payload.map((p) => p.skuId));
        this.logger.info(LogCategory.LICENSE, 'Licenses assigned', { skus: payload.map((p) => p.outcome.skuLabel) });
      } catch (err) {
        this.logger.error(LogCategory.LICENSE, 'License assignment failed', err);
        for (const { outcome } of payload) {
          outcome.succeeded = false;
          outcome.reason = describeError(err);
        }
      }
    }

    return outcomes;
  }
}
