/**
 * Fault taxonomy for a provisioning run.
 *
 * Fatal kinds (thrown out of the orchestrator): InvalidTicket, Configuration,
 * Unresolvable, and TransportFault during search or creation. The other kinds
 * are recorded as step or item outcomes and never end the run.
 */
export const PROVISIONING_ERROR_KIND = {
  /** A search returned zero matches */
  NOT_FOUND: 'NotFound',
  /** Principal name already taken; resolved by the operator decision */
  DUPLICATE_IDENTITY: 'DuplicateIdentity',
  /** The alternate principal name is taken as well */
  UNRESOLVABLE: 'Unresolvable',
  /** Group lookup was ambiguous, absent, or the group cannot take members */
  UNCLASSIFIABLE: 'Unclassifiable',
  /** No license rule matched the user */
  POLICY_MISMATCH: 'PolicyMismatch',
  /** A required SKU has no free seats */
  EXHAUSTED: 'Exhausted',
  /** A directory call failed at the protocol level */
  TRANSPORT_FAULT: 'TransportFault',
  /** The ticket text cannot yield a usable user record */
  INVALID_TICKET: 'InvalidTicket',
  /** Missing or malformed configuration */
  CONFIGURATION: 'Configuration',
} as const;

export type ProvisioningErrorKind = typeof PROVISIONING_ERROR_KIND[keyof typeof PROVISIONING_ERROR_KIND];

export class ProvisioningError extends Error {
  readonly kind: ProvisioningErrorKind;
  /** HTTP status of the failed directory call, for transport faults. */
  readonly status?: number;

  constructor(kind: ProvisioningErrorKind, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ProvisioningError';
    this.kind = kind;
    this.status = options?.status;
  }
}

export function createProvisioningError(params: {
  kind: ProvisioningErrorKind;
  detail: string;
  status?: number;
  cause?: unknown;
}): ProvisioningError {
  return new ProvisioningError(params.kind, params.detail, { status: params.status, cause: params.cause });
}

export function isProvisioningError(error: unknown, kind?: ProvisioningErrorKind): error is ProvisioningError {
  return error instanceof ProvisioningError && (kind === undefined || error.kind === kind);
}

/** Message text of any thrown value. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
