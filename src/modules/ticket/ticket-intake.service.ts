import { Inject, Injectable } from '@nestjs/common';

import { createProvisioningError, PROVISIONING_ERROR_KIND } from '../../domain/errors/provisioning-error';
import type { UserRecord } from '../../domain/models/user-record.model';
import { PROVISIONING_CONFIG, type ProvisioningConfig } from '../config/provisioning-config';
import { LogCategory } from '../logging/log-levels';
import { ProvisioningLogger } from '../logging/provisioning-logger.service';
import { ProvisioningPolicyService } from '../policy/provisioning-policy.service';
import { parseRawTicket } from './raw-ticket-parser';
import { buildUserRecord } from './user-record-builder';

/**
 * Turns ticket text into the finished user record the orchestrator consumes:
 * parse → build → org group policy.
 */
@Injectable()
export class TicketIntakeService {
  constructor(
    @Inject(PROVISIONING_CONFIG) private readonly config: ProvisioningConfig,
    private readonly policy: ProvisioningPolicyService,
    private readonly logger: ProvisioningLogger,
  ) {}

  intake(text: string): UserRecord {
    if (text.trim().length === 0) {
      throw createProvisioningError({ kind: PROVISIONING_ERROR_KIND.INVALID_TICKET, detail: 'Ticket text is empty.' });
    }

    const fields = parseRawTicket(text, { headerMarker: this.config.ticketHeaderMarker });
    this.logger.trace(LogCategory.TICKET, 'Ticket fields parsed', { fields });

    const record = buildUserRecord(fields);
    const missing = [
      record.firstName ? undefined : 'first name',
      record.lastName ? undefined : 'last name',
    ].filter((m): m is string => m !== undefined);
    if (missing.length > 0) {
      throw createProvisioningError({
        kind: PROVISIONING_ERROR_KIND.INVALID_TICKET,
        detail: `Ticket has no ${missing.join(' or ')}; found fields: ${fields.map((f) => f.name).join(', ') || 'none'}.`,
      });
    }

    this.policy.applyGroupPolicy(record);
    this.logger.info(LogCategory.TICKET, 'Ticket parsed', {
      firstName: record.firstName,
      lastName: record.lastName,
      groups: record.requestedGroups.length,
    });
    return record;
  }
}
