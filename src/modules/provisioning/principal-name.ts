import { stripDiacritics } from '../ticket/text-normalizer';

/**
 * `first.last@domain` with diacritics removed. Names arrive from the record
 * builder already collapsed to single tokens.
 */
export function buildPrincipalName(firstName: string, lastName: string, domain: string): string {
  return `${stripDiacritics(firstName)}.${stripDiacritics(lastName)}@${domain}`;
}

/** Insert `suffix` before the last '@': `John.Doe@x` → `John.Doe1@x`. */
export function alternatePrincipalName(userPrincipalName: string, suffix: string): string {
  const at = userPrincipalName.lastIndexOf('@');
  if (at < 0) return `${userPrincipalName}${suffix}`;
  return `${userPrincipalName.slice(0, at)}${suffix}${userPrincipalName.slice(at)}`;
}

export function mailNicknameOf(userPrincipalName: string): string {
  const at = userPrincipalName.lastIndexOf('@');
  return at < 0 ? userPrincipalName : userPrincipalName.slice(0, at);
}

/**
 * Convert a ticket phone number to the `+<country> <number>` form the
 * phone-method endpoint takes.
 *
 *   "(555) 123-4567"   → "+1 5551234567"
 *   "1-555-123-4567"   → "+1 5551234567"
 *   "+44 7911 123456"  → "+44 7911123456"
 *
 * A number written with a leading `+` needs a separator after its country code
 * ("+49 15112345678"): the compact form "+4915112345678" is only read when its
 * country code is the default one, since country codes vary in length.
 *
 * Returns undefined when the value cannot be read as a mobile number.
 */
export function normalizePhoneNumber(raw: string, defaultCountryCode: string): string | undefined {
  const trimmed = raw.trim();
  const digits = trimmed.replace(/\D/g, '');

  if (trimmed.startsWith('+')) {
    const separated = /^\+(\d{1,3})\D+(\d.*)$/.exec(trimmed);
    if (separated) {
      const national = separated[2].replace(/\D/g, '');
      return national.length >= 4 ? `+${separated[1]} ${national}` : undefined;
    }
  }

  if (digits.length === 10 && !trimmed.startsWith('+')) {
    return `+${defaultCountryCode} ${digits}`;
  }
  if (digits.length === defaultCountryCode.length + 10 && digits.startsWith(defaultCountryCode)) {
    return `+${defaultCountryCode} ${digits.slice(defaultCountryCode.length)}`;
  }
  return undefined;
}

/** Step detail for a value `normalizePhoneNumber` rejected. */
export function describeUnusablePhoneNumber(raw: string): string {
  const trimmed = raw.trim();
  if (/^\+\d{5,}$/.test(trimmed)) {
    return `"${trimmed}": country code not separable; add a space after the country code`;
  }
  return `"${trimmed}" is not a usable mobile number`;
}
