import * as fs from 'node:fs';
import * as path from 'node:path';

import { createProvisioningError, describeError, PROVISIONING_ERROR_KIND } from '../../domain/errors/provisioning-error';
import type { UserRecord } from '../../domain/models/user-record.model';

/** Injection token for the loaded ProvisioningPolicy. */
export const PROVISIONING_POLICY = 'PROVISIONING_POLICY';

export const DEFAULT_POLICY_FILE = path.resolve(__dirname, '..', '..', '..', 'config', 'provisioning-policy.json');

/** Record attributes a rule may test. */
export const POLICY_MATCH_FIELDS = ['division', 'office', 'department', 'title'] as const;

export type PolicyMatchField = typeof POLICY_MATCH_FIELDS[number];

/**
 * Conditions are ANDed; each is a case-insensitive substring test against the
 * record attribute. An empty `when` matches every record.
 */
export type PolicyCondition = Partial<Record<PolicyMatchField, string>>;

export interface GroupPolicyRule {
  description?: string;
  when: PolicyCondition;
  groups: string[];
}

export interface LicensePolicyRule {
  description?: string;
  when: PolicyCondition;
  /** SKU part numbers, e.g. "SPE_E3". */
  skus: string[];
}

export interface ProvisioningPolicy {
  groupRules: GroupPolicyRule[];
  licenseRules: LicensePolicyRule[];
}

export function matchesCondition(record: UserRecord, when: PolicyCondition): boolean {
  return POLICY_MATCH_FIELDS.every((key) => {
    const expected = when[key];
    if (expected === undefined) return true;
    return record[key].toLowerCase().includes(expected.toLowerCase());
  });
}

// ─── Validation ──────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPolicyMatchField(key: string): key is PolicyMatchField {
  return (POLICY_MATCH_FIELDS as readonly string[]).includes(key);
}

function invalid(where: string, detail: string): Error {
  return createProvisioningError({
    kind: PROVISIONING_ERROR_KIND.CONFIGURATION,
    detail: `Invalid provisioning policy at ${where}: ${detail}`,
  });
}

function parseCondition(value: unknown, where: string): PolicyCondition {
  if (value === undefined) return {};
  if (!isRecord(value)) throw invalid(where, 'expected an object.');
  const condition: PolicyCondition = {};
  for (const [key, expected] of Object.entries(value)) {
    if (!isPolicyMatchField(key)) {
      throw invalid(`${where}.${key}`, `unknown attribute. Allowed: ${POLICY_MATCH_FIELDS.join(', ')}.`);
    }
    if (typeof expected !== 'string') throw invalid(`${where}.${key}`, 'expected a string.');
    condition[key] = expected;
  }
  return condition;
}

function parseStringList(value: unknown, where: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string' && v.trim().length > 0)) {
    throw invalid(where, 'expected an array of non-empty strings.');
  }
  return value.map((v) => v.trim());
}

function parseRules(
  value: unknown,
  where: string,
  listKey: 'groups' | 'skus',
): Array<{ description?: string; when: PolicyCondition; items: string[] }> {
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw invalid(where, 'expected an array of rules.');
  return value.map((raw: unknown, i) => {
    const at = `${where}[${i}]`;
    if (!isRecord(raw)) throw invalid(at, 'expected an object.');
    return {
      description: typeof raw.description === 'string' ? raw.description : undefined,
      when: parseCondition(raw.when, `${at}.when`),
      items: parseStringList(raw[listKey], `${at}.${listKey}`),
    };
  });
}

/** Validate an already-parsed JSON document. */
export function parseProvisioningPolicy(document: unknown): ProvisioningPolicy {
  if (!isRecord(document)) throw invalid('root', 'expected an object.');
  return {
    groupRules: parseRules(document.groupRules, 'groupRules', 'groups').map(({ items, ...rule }) => ({
      ...rule,
      groups: items,
    })),
    licenseRules: parseRules(document.licenseRules, 'licenseRules', 'skus').map(({ items, ...rule }) => ({
      ...rule,
      skus: items,
    })),
  };
}

export function loadProvisioningPolicy(filePath: string = DEFAULT_POLICY_FILE): ProvisioningPolicy {
  let document: unknown;
  try {
    document = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw createProvisioningError({
      kind: PROVISIONING_ERROR_KIND.CONFIGURATION,
      detail: `Could not read provisioning policy "${filePath}": ${describeError(err)}`,
      cause: err,
    });
  }
  return parseProvisioningPolicy(document);
}
