import { Inject, Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';

import type { IDirectoryGateway } from '../../domain/directory/directory-gateway.interface';
import { DIRECTORY_GATEWAY } from '../../domain/directory/directory.tokens';
import {
  createProvisioningError,
  describeError,
  isProvisioningError,
  PROVISIONING_ERROR_KIND,
} from '../../domain/errors/provisioning-error';
import type { CreateDirectoryUserInput, DirectoryUser } from '../../domain/models/directory.model';
import {
  emptyProvisioningResult,
  freezeProvisioningResult,
  ProvisioningState,
  type ProvisioningResult,
  type ProvisioningRun,
  type ProvisioningStep,
  type StepOutcome,
} from '../../domain/models/provisioning-result.model';
import type { UserRecord } from '../../domain/models/user-record.model';
import { PROVISIONING_CONFIG, type ProvisioningConfig } from '../config/provisioning-config';
import { LogCategory } from '../logging/log-levels';
import { ProvisioningLogger } from '../logging/provisioning-logger.service';
import { ProvisioningPolicyService } from '../policy/provisioning-policy.service';
import { GroupResolver } from './group-resolver.service';
import { LicenseAllocator } from './license-allocator.service';
import { OPERATOR_PROMPT, type OperatorPrompt } from './operator-prompt';
import {
  alternatePrincipalName,
  buildPrincipalName,
  describeUnusablePhoneNumber,
  mailNicknameOf,
  normalizePhoneNumber,
} from './principal-name';
import { ProvisioningDelays } from './provisioning-delays';

/** Per-run bookkeeping; never shared between runs. */
interface RunState {
  states: ProvisioningState[];
  result: ProvisioningResult;
}

/**
 * ProvisioningOrchestrator: drives one user record through
 *
 *   Searching → NotFound → Creating
 *   Searching → Found → AwaitingDecision → Aborted | RetryingAltName → Creating
 *   Creating → Created → AttachingPhone → AttachingManager → AttachingGroups
 *            → AttachingLicense → Complete
 *
 * Search and creation faults end the run by rejecting. Each attachment step
 * runs once and records its outcome; a failed step never stops the next one.
 */
@Injectable()
export class ProvisioningOrchestrator {
  constructor(
    @Inject(DIRECTORY_GATEWAY) private readonly directory: IDirectoryGateway,
    @Inject(PROVISIONING_CONFIG) private readonly config: ProvisioningConfig,
    @Inject(OPERATOR_PROMPT) private readonly prompt: OperatorPrompt,
    private readonly groups: GroupResolver,
    private readonly licenses: LicenseAllocator,
    private readonly policy: ProvisioningPolicyService,
    private readonly delays: ProvisioningDelays,
    private readonly logger: ProvisioningLogger,
  ) {}

  run(record: UserRecord): Promise<ProvisioningRun> {
    return this.logger.runWithContext({ runId: randomUUID(), startTime: Date.now() }, () => this.execute(record));
  }

  private async execute(record: UserRecord): Promise<ProvisioningRun> {
    const run: RunState = { states: [], result: emptyProvisioningResult() };

    // ─── Uniqueness ───────────────────────────────────────────────
    let userPrincipalName = buildPrincipalName(record.firstName, record.lastName, this.config.directoryDomain);
    this.logger.enrichContext({ userPrincipalName });

    this.enter(run, ProvisioningState.Searching);
    const conflicts = await this.directory.findUsersByPrincipalName(userPrincipalName);

    if (conflicts.length > 0) {
      this.enter(run, ProvisioningState.Found);
      this.enter(run, ProvisioningState.AwaitingDecision);
      const alternate = alternatePrincipalName(userPrincipalName, this.config.alternateUpnSuffix);
      this.logger.warn(LogCategory.ORCHESTRATOR, 'Principal name already in use', {
        kind: PROVISIONING_ERROR_KIND.DUPLICATE_IDENTITY,
        conflicts: conflicts.map((u) => u.userPrincipalName),
      });

      const accepted = await this.prompt.confirmAlternateName({
        userPrincipalName,
        alternatePrincipalName: alternate,
        conflicts,
      });
      if (!accepted) {
        this.enter(run, ProvisioningState.Aborted);
        return this.finish(run, 'aborted', conflicts);
      }

      this.enter(run, ProvisioningState.RetryingAltName);
      const requested = userPrincipalName;
      userPrincipalName = alternate;
      this.logger.enrichContext({ userPrincipalName });
      const alternateConflicts = await this.directory.findUsersByPrincipalName(userPrincipalName);
      if (alternateConflicts.length > 0) {
        const error = createProvisioningError({
          kind: PROVISIONING_ERROR_KIND.UNRESOLVABLE,
          detail: `Both ${requested} and its alternate ${alternate} are already in use.`,
        });
        this.logger.fatal(LogCategory.ORCHESTRATOR, 'Alternate principal name also taken', error);
        throw error;
      }
    } else {
      this.enter(run, ProvisioningState.NotFound);
    }

    // ─── Creation ─────────────────────────────────────────────────
    this.enter(run, ProvisioningState.Creating);
    const created = await this.createUser(record, userPrincipalName);
    this.enter(run, ProvisioningState.Created);

    run.result.directoryId = created.id;
    run.result.displayName = created.displayName;
    run.result.userPrincipalName = created.userPrincipalName;
    run.result.officeLocation = created.officeLocation ?? '';

    // ─── Attachments ──────────────────────────────────────────────
    // The phone-method endpoint is the one that rejects a user it cannot see yet.
    if (record.personalPhone) {
      await this.delays.waitForPropagation();
    }

    this.enter(run, ProvisioningState.AttachingPhone);
    await this.attempt(run, 'phone', () => this.attachPhone(run.result, record));
    await this.delays.pace();

    this.enter(run, ProvisioningState.AttachingManager);
    await this.attempt(run, 'manager', () => this.attachManager(run.result, record));
    await this.delays.pace();

    this.enter(run, ProvisioningState.AttachingGroups);
    await this.attempt(run, 'groups', () => this.attachGroups(run.result, record));
    await this.delays.pace();

    this.enter(run, ProvisioningState.AttachingLicense);
    await this.attempt(run, 'license', () => this.attachLicenses(run.result, record));

    this.enter(run, ProvisioningState.Complete);
    return this.finish(run, 'complete', conflicts);
  }

  private async createUser(record: UserRecord, userPrincipalName: string): Promise<DirectoryUser> {
    const input: CreateDirectoryUserInput = {
      accountEnabled: true,
      givenName: record.firstName,
      surname: record.lastName,
      displayName: `${record.firstName} ${record.lastName}`,
      mailNickname: mailNicknameOf(userPrincipalName),
      userPrincipalName,
      officeLocation: record.office,
      department: record.department,
      jobTitle: record.title,
      usageLocation: this.config.usageLocation,
      passwordProfile: {
        password: this.config.initialPassword,
        forceChangePasswordNextSignIn: true,
      },
    };

    try {
      const created = await this.directory.createUser(input);
      this.logger.info(LogCategory.ORCHESTRATOR, 'User created', { directoryId: created.id });
      return created;
    } catch (err) {
      this.logger.fatal(LogCategory.ORCHESTRATOR, 'User creation failed', err);
      throw err;
    }
  }

  // ─── Steps ────────────────────────────────────────────────────────

  /** Run one attachment step and record exactly one outcome for it. */
  private async attempt(
    run: RunState,
    step: ProvisioningStep,
    fn: () => Promise<Omit<StepOutcome, 'step'>>,
  ): Promise<void> {
    let outcome: StepOutcome;
    try {
      outcome = { step, ...(await fn()) };
    } catch (err) {
      if (isProvisioningError(err, PROVISIONING_ERROR_KIND.POLICY_MISMATCH)) {
        this.logger.warn(LogCategory.ORCHESTRATOR, `Step "${step}" not applicable: ${err.message}`);
      } else {
        this.logger.error(LogCategory.ORCHESTRATOR, `Step "${step}" failed`, err);
      }
      outcome = { step, status: 'failed', detail: describeError(err) };
    }
    run.result.steps.push(outcome);
  }

  private async attachPhone(result: ProvisioningResult, record: UserRecord): Promise<Omit<StepOutcome, 'step'>> {
    if (!record.personalPhone) return { status: 'skipped', detail: 'No phone number on the ticket' };

    const phoneNumber = normalizePhoneNumber(record.personalPhone, this.config.phoneCountryCode);
    if (!phoneNumber) {
      return { status: 'failed', detail: describeUnusablePhoneNumber(record.personalPhone) };
    }

    const method = await this.directory.addMobilePhoneMethod(result.directoryId, phoneNumber);
    result.assignedAuthPhone = method.phoneNumber;
    this.logger.info(LogCategory.ORCHESTRATOR, 'Authentication phone added');
    return { status: 'succeeded', detail: method.phoneNumber };
  }

  private async attachManager(result: ProvisioningResult, record: UserRecord): Promise<Omit<StepOutcome, 'step'>> {
    if (!record.managerName) return { status: 'skipped', detail: 'No manager on the ticket' };

    const matches = await this.directory.findUsersByDisplayName(record.managerName);
    if (matches.length === 0) {
      return { status: 'failed', detail: `${PROVISIONING_ERROR_KIND.NOT_FOUND}: no user named "${record.managerName}"` };
    }
    if (matches.length > 1) {
      return { status: 'failed', detail: `${matches.length} users named "${record.managerName}"; set the manager manually` };
    }

    await this.directory.setManager(result.directoryId, matches[0].id);
    this.logger.info(LogCategory.ORCHESTRATOR, 'Manager set', { manager: matches[0].userPrincipalName });
    return { status: 'succeeded', detail: matches[0].displayName };
  }

  private async attachGroups(result: ProvisioningResult, record: UserRecord): Promise<Omit<StepOutcome, 'step'>> {
    if (record.requestedGroups.length === 0) return { status: 'skipped', detail: 'No groups requested' };

    const outcomes = await this.groups.addToGroups(result.directoryId, record.requestedGroups);
    result.groupOutcomes.push(...outcomes);
    const added = outcomes.filter((o) => o.succeeded).length;
    return {
      status: added === outcomes.length ? 'succeeded' : 'failed',
      detail: `${added} of ${outcomes.length} groups added`,
    };
  }

  private async attachLicenses(result: ProvisioningResult, record: UserRecord): Promise<Omit<StepOutcome, 'step'>> {
    const outcomes = await this.licenses.allocate(result.directoryId, this.policy.requiredSkus(record));
    result.licenseOutcomes.push(...outcomes);
    const assigned = outcomes.filter((o) => o.succeeded).length;
    return {
      status: assigned === outcomes.length ? 'succeeded' : 'failed',
      detail: `${assigned} of ${outcomes.length} licenses assigned`,
    };
  }

  // ─── Bookkeeping ──────────────────────────────────────────────────

  private enter(run: RunState, state: ProvisioningState): void {
    run.states.push(state);
    this.logger.debug(LogCategory.ORCHESTRATOR, `State: ${state}`);
  }

  private finish(run: RunState, status: ProvisioningRun['status'], conflicts: DirectoryUser[]): ProvisioningRun {
    this.logger.info(LogCategory.ORCHESTRATOR, `Run ${status}`, { steps: run.result.steps });
    return {
      status,
      states: [...run.states],
      conflicts,
      result: freezeProvisioningResult(run.result),
    };
  }
}
