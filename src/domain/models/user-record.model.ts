/**
 * Domain model for a parsed ticket.
 *
 * Every string field defaults to '' so downstream string operations never see
 * undefined. Only `requestedGroups` may change after building (org group policy
 * appends to it before provisioning starts).
 */
export interface UserRecord {
  readonly firstName: string;
  readonly lastName: string;
  readonly managerName: string;
  readonly title: string;
  readonly division: string;
  readonly office: string;
  readonly department: string;
  readonly personalPhone: string;
  readonly additionalNotes: string;
  /** Insertion order is display and processing order. */
  requestedGroups: string[];
}

/** One `(field label, value)` pair produced by the raw ticket parser. */
export interface RawField {
  name: string;
  rawValue: string;
}

export type UserRecordTextField = Exclude<keyof UserRecord, 'requestedGroups'>;

export function emptyUserRecord(): UserRecord {
  return {
    firstName: '',
    lastName: '',
    managerName: '',
    title: '',
    division: '',
    office: '',
    department: '',
    personalPhone: '',
    additionalNotes: '',
    requestedGroups: [],
  };
}
