import { createProvisioningError, PROVISIONING_ERROR_KIND } from '../../../domain/errors/provisioning-error';
import type { DirectoryGroup, DirectoryUser, PhoneMethod, SubscribedSku } from '../../../domain/models/directory.model';

/**
 * Narrow untyped Graph JSON into domain shapes. A response missing a
 * required attribute is reported as a transport fault.
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(what: string): Error {
  return createProvisioningError({
    kind: PROVISIONING_ERROR_KIND.TRANSPORT_FAULT,
    detail: `Unexpected directory response: ${what}`,
  });
}

const str = (value: unknown): string => (typeof value === 'string' ? value : '');
const num = (value: unknown): number => (typeof value === 'number' ? value : 0);

export function toCollection(response: unknown): unknown[] {
  if (!isRecord(response) || !Array.isArray(response.value)) {
    throw malformed('expected a collection with a "value" array');
  }
  return response.value;
}

export function toDirectoryUser(raw: unknown): DirectoryUser {
  if (!isRecord(raw) || typeof raw.id !== 'string') throw malformed('user without an id');
  return {
    id: raw.id,
    displayName: str(raw.displayName),
    userPrincipalName: str(raw.userPrincipalName),
    officeLocation: typeof raw.officeLocation === 'string' ? raw.officeLocation : null,
  };
}

export function toDirectoryGroup(raw: unknown): DirectoryGroup {
  if (!isRecord(raw) || typeof raw.id !== 'string') throw malformed('group without an id');
  return {
    id: raw.id,
    displayName: str(raw.displayName),
    mail: typeof raw.mail === 'string' ? raw.mail : null,
    groupTypes: Array.isArray(raw.groupTypes) ? raw.groupTypes.filter((t): t is string => typeof t === 'string') : [],
    mailEnabled: raw.mailEnabled === true,
    securityEnabled: raw.securityEnabled === true,
  };
}

export function toSubscribedSku(raw: unknown): SubscribedSku {
  if (!isRecord(raw) || typeof raw.skuId !== 'string') throw malformed('subscribed SKU without a skuId');
  const prepaid = isRecord(raw.prepaidUnits) ? raw.prepaidUnits : {};
  return {
    skuId: raw.skuId,
    skuPartNumber: str(raw.skuPartNumber),
    consumedUnits: num(raw.consumedUnits),
    prepaidUnits: { enabled: num(prepaid.enabled) },
  };
}

export function toPhoneMethod(raw: unknown): PhoneMethod {
  if (!isRecord(raw) || typeof raw.phoneNumber !== 'string') throw malformed('phone method without a number');
  return { phoneNumber: raw.phoneNumber };
}
