import type { RawField, UserRecord, UserRecordTextField } from '../../domain/models/user-record.model';
import { emptyUserRecord } from '../../domain/models/user-record.model';
import { TICKET_FIELD_RULES, type FieldRule } from './ticket-field-table';

/**
 * Map parsed ticket fields onto a user record.
 *
 * Each field is dispatched to the first rule whose matcher accepts its label;
 * unrecognized labels are ignored. Group names accumulate in encounter order.
 */
export function buildUserRecord(fields: readonly RawField[], rules: readonly FieldRule[] = TICKET_FIELD_RULES): UserRecord {
  const record = emptyUserRecord();
  const text: Partial<Record<UserRecordTextField, string>> = {};

  for (const { name, rawValue } of fields) {
    const rule = rules.find((r) => r.matches(name));
    if (!rule) continue;

    if (rule.field === 'requestedGroups') {
      record.requestedGroups.push(...rule.extract(rawValue));
      continue;
    }

    const value = rule.extract(rawValue);
    if (rule.preserveExisting && text[rule.field]) continue;
    text[rule.field] = value;
  }

  return {
    ...record,
    firstName: text.firstName ?? '',
    lastName: text.lastName ?? '',
    managerName: text.managerName ?? '',
    title: text.title ?? '',
    division: text.division ?? '',
    office: text.office ?? '',
    department: text.department ?? '',
    personalPhone: text.personalPhone ?? '',
    additionalNotes: text.additionalNotes ?? '',
  };
}
