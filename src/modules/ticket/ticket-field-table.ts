import type { UserRecordTextField } from '../../domain/models/user-record.model';
import { collapseCompoundName } from './text-normalizer';

/**
 * One row of the label → field mapping. Rows are evaluated in order and the
 * first row whose matcher accepts a label handles it.
 */
export interface TicketFieldRule {
  field: UserRecordTextField | 'requestedGroups';
  matches: (label: string) => boolean;
  /** When true, a value already set by an earlier entry is kept. */
  preserveExisting?: boolean;
}

export interface TextFieldRule extends TicketFieldRule {
  field: UserRecordTextField;
  extract: (value: string) => string;
}

export interface GroupFieldRule extends TicketFieldRule {
  field: 'requestedGroups';
  extract: (value: string) => string[];
}

export type FieldRule = TextFieldRule | GroupFieldRule;

const labelContains = (...needles: string[]) => (label: string): boolean => {
  const lower = label.toLowerCase();
  return needles.some((n) => lower.includes(n));
};

/** Display name portion of `Name <address>`. */
export function extractManagerName(value: string): string {
  const bracket = value.indexOf('<');
  return (bracket === -1 ? value : value.slice(0, bracket)).trim();
}

/**
 * Controlled-choice fields may carry a write-in after a `>` marker
 * ("Other\n> Field Services"). The write-in wins over the plain choice.
 */
export function extractChoiceValue(value: string): string {
  const marker = value.indexOf('>');
  return (marker === -1 ? value : value.slice(marker + 1)).trim();
}

/**
 * Split a groups value into names. Items are separated by commas or line
 * breaks. Periods, semicolons and colons are dropped, except that periods stay
 * in mail addresses so they can still be looked up.
 */
export function extractGroupNames(value: string): string[] {
  return value
    .split(/[,\n]/)
    .map((item) => item.replace(item.includes('@') ? /[;:]/g : /[.;:]/g, '').trim())
    .filter((item) => item.length > 0);
}

const collapseName = (value: string): string => collapseCompoundName(value.trim());
const trimmed = (value: string): string => value.trim();

export const TICKET_FIELD_RULES: readonly FieldRule[] = [
  { field: 'firstName', matches: labelContains('first name', 'firstname', 'given name'), extract: collapseName },
  { field: 'lastName', matches: labelContains('last name', 'lastname', 'surname'), extract: collapseName },
  { field: 'managerName', matches: labelContains('manager', 'supervisor'), extract: extractManagerName },
  { field: 'title', matches: labelContains('title'), extract: trimmed },
  { field: 'division', matches: labelContains('division'), extract: trimmed },
  { field: 'personalPhone', matches: labelContains('phone', 'mobile'), extract: trimmed },
  { field: 'department', matches: labelContains('department'), extract: extractChoiceValue, preserveExisting: true },
  { field: 'office', matches: labelContains('office', 'location'), extract: extractChoiceValue, preserveExisting: true },
  { field: 'requestedGroups', matches: labelContains('group', 'distribution'), extract: extractGroupNames },
  { field: 'additionalNotes', matches: labelContains('note', 'additional'), extract: trimmed },
];
