import { Inject, Injectable } from '@nestjs/common';

import type { IDirectoryGateway } from '../../domain/directory/directory-gateway.interface';
import { DIRECTORY_GATEWAY } from '../../domain/directory/directory.tokens';
import { describeError } from '../../domain/errors/provisioning-error';
import type { DirectoryGroup } from '../../domain/models/directory.model';
import { GroupKind, type GroupClassification, type GroupOutcome } from '../../domain/models/provisioning-result.model';
import { LogCategory } from '../logging/log-levels';
import { ProvisioningLogger } from '../logging/provisioning-logger.service';

export const GROUP_NOT_FOUND = 'Group not found';

const NOT_ADDABLE_REASON: Partial<Record<GroupKind, string>> = {
  [GroupKind.DistributionList]: 'Distribution list; membership is managed in the mail system',
  [GroupKind.MailEnabledSecurityGroup]: 'Mail-enabled security group; membership is managed in the mail system',
};

/**
 * | groupTypes | mailEnabled | securityEnabled | kind                     | addable |
 * |------------|-------------|-----------------|--------------------------|---------|
 * | non-empty  |      -      |        -        | Unified                  | yes     |
 * | empty      |    false    |        -        | SecurityGroup            | yes     |
 * | empty      |    true     |      false      | DistributionList         | no      |
 * | empty      |    true     |      true       | MailEnabledSecurityGroup | no      |
 */
export function classifyGroup(group: DirectoryGroup): GroupClassification {
  let kind: GroupKind;
  if (group.groupTypes.length > 0) {
    kind = GroupKind.Unified;
  } else if (!group.mailEnabled) {
    kind = GroupKind.SecurityGroup;
  } else if (!group.securityEnabled) {
    kind = GroupKind.DistributionList;
  } else {
    kind = GroupKind.MailEnabledSecurityGroup;
  }

  const reason = NOT_ADDABLE_REASON[kind] ?? '';
  return { exists: true, kind, directoryId: group.id, addable: reason === '', reason };
}

function notFound(reason: string = GROUP_NOT_FOUND): GroupClassification {
  return { exists: false, directoryId: '', addable: false, reason };
}

/**
 * GroupResolver: classifies requested group names and adds the user to each
 * addable one. Every requested name yields exactly one outcome; a failure on
 * one group never stops the rest.
 */
@Injectable()
export class GroupResolver {
  constructor(
    @Inject(DIRECTORY_GATEWAY) private readonly directory: IDirectoryGateway,
    private readonly logger: ProvisioningLogger,
  ) {}

  /**
   * Names containing '@' are looked up by mail and classified by the table
   * above. Other names are looked up by display name and are addable when
   * exactly one group carries it.
   */
  async resolve(groupName: string): Promise<GroupClassification> {
    if (groupName.includes('@')) {
      const matches = await this.directory.findGroupsByMail(groupName);
      if (matches.length === 0) return notFound();
      if (matches.length > 1) return notFound(`Ambiguous: ${matches.length} groups use this address`);
      return classifyGroup(matches[0]);
    }

    const matches = await this.directory.findGroupsByDisplayName(groupName);
    if (matches.length === 0) return notFound();
    if (matches.length > 1) return notFound(`Ambiguous: ${matches.length} groups share this name`);
    const { kind } = classifyGroup(matches[0]);
    return { exists: true, kind, directoryId: matches[0].id, addable: true, reason: '' };
  }

  async addToGroups(userId: string, groupNames: readonly string[]): Promise<GroupOutcome[]> {
    const outcomes: GroupOutcome[] = [];

    for (const groupName of groupNames) {
      try {
        const classification = await this.resolve(groupName);
        this.logger.debug(LogCategory.GROUP, 'Group classified', { groupName, ...classification });

        if (!classification.addable) {
          this.logger.warn(LogCategory.GROUP, 'Group not addable', { groupName, reason: classification.reason });
          outcomes.push({ groupName, succeeded: false, reason: classification.reason });
          continue;
        }

        await this.directory.addGroupMember(classification.directoryId, userId);
        this.logger.info(LogCategory.GROUP, 'Added to group', { groupName });
        outcomes.push({ groupName, succeeded: true, reason: '' });
      } catch (err) {
        this.logger.error(LogCategory.GROUP, 'Group membership failed', err, { groupName });
        outcomes.push({ groupName, succeeded: false, reason: describeError(err) });
      }
    }

    return outcomes;
  }
}
