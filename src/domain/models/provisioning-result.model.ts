import type { DirectoryUser } from './directory.model';

export enum GroupKind {
  Unified = 'Unified',
  SecurityGroup = 'SecurityGroup',
  MailEnabledSecurityGroup = 'MailEnabledSecurityGroup',
  DistributionList = 'DistributionList',
}

/** Transient result of one group lookup; never persisted. */
export interface GroupClassification {
  exists: boolean;
  kind?: GroupKind;
  directoryId: string;
  addable: boolean;
  /** Why the group cannot be added; empty when addable. */
  reason: string;
}

export interface GroupOutcome {
  groupName: string;
  succeeded: boolean;
  reason: string;
}

export interface LicenseOutcome {
  skuLabel: string;
  succeeded: boolean;
  reason: string;
}

export interface SkuAvailability {
  skuId: string;
  available: number;
  total: number;
}

/** Seat counts are read at call time, so a decision is computed fresh per run. */
export interface LicenseDecision {
  requiredSkus: ReadonlySet<string>;
  availability: ReadonlyMap<string, SkuAvailability>;
}

export type ProvisioningStep = 'phone' | 'manager' | 'groups' | 'license';

export type StepStatus = 'succeeded' | 'failed' | 'skipped';

export interface StepOutcome {
  step: ProvisioningStep;
  status: StepStatus;
  detail: string;
}

/**
 * Aggregate filled in by the orchestrator as each step completes.
 * Empty strings mean "not set".
 */
export interface ProvisioningResult {
  directoryId: string;
  displayName: string;
  userPrincipalName: string;
  officeLocation: string;
  assignedAuthPhone: string;
  groupOutcomes: GroupOutcome[];
  licenseOutcomes: LicenseOutcome[];
  steps: StepOutcome[];
}

export type FrozenProvisioningResult = Readonly<
  Omit<ProvisioningResult, 'groupOutcomes' | 'licenseOutcomes' | 'steps'> & {
    groupOutcomes: ReadonlyArray<Readonly<GroupOutcome>>;
    licenseOutcomes: ReadonlyArray<Readonly<LicenseOutcome>>;
    steps: ReadonlyArray<Readonly<StepOutcome>>;
  }
>;

export enum ProvisioningState {
  Searching = 'Searching',
  NotFound = 'NotFound',
  Found = 'Found',
  AwaitingDecision = 'AwaitingDecision',
  RetryingAltName = 'RetryingAltName',
  Aborted = 'Aborted',
  Creating = 'Creating',
  Created = 'Created',
  AttachingPhone = 'AttachingPhone',
  AttachingManager = 'AttachingManager',
  AttachingGroups = 'AttachingGroups',
  AttachingLicense = 'AttachingLicense',
  Complete = 'Complete',
}

export interface ProvisioningRun {
  status: 'complete' | 'aborted';
  /** States visited, in order. */
  states: ProvisioningState[];
  /** Existing identities that triggered the duplicate-name decision, if any. */
  conflicts: DirectoryUser[];
  result: FrozenProvisioningResult;
}

export function emptyProvisioningResult(): ProvisioningResult {
  return {
    directoryId: '',
    displayName: '',
    userPrincipalName: '',
    officeLocation: '',
    assignedAuthPhone: '',
    groupOutcomes: [],
    licenseOutcomes: [],
    steps: [],
  };
}

export function freezeProvisioningResult(result: ProvisioningResult): FrozenProvisioningResult {
  return Object.freeze({
    ...result,
    groupOutcomes: Object.freeze(result.groupOutcomes.map((o) => Object.freeze({ ...o }))),
    licenseOutcomes: Object.freeze(result.licenseOutcomes.map((o) => Object.freeze({ ...o }))),
    steps: Object.freeze(result.steps.map((s) => Object.freeze({ ...s }))),
  });
}
