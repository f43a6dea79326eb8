/**
 * Name normalization for principal-name construction.
 */

/** Checked in this order; only the first one present is removed. */
const COMPOUND_NAME_DELIMITERS = [' ', '-', "'"] as const;

/**
 * Collapse a compound name into one alias-safe token by removing every
 * occurrence of the first delimiter kind found (space, then hyphen, then
 * apostrophe).
 *
 *   "John Paul"   → "JohnPaul"
 *   "Smith-Jones" → "SmithJones"
 *   "O'hara"      → "Ohara"
 */
export function collapseCompoundName(name: string): string {
  const delimiter = COMPOUND_NAME_DELIMITERS.find((d) => name.includes(d));
  return delimiter === undefined ? name : name.split(delimiter).join('');
}

/**
 * Canonical decomposition (NFD) followed by removal of non-spacing marks,
 * e.g. "José" → "Jose", "Łukasz" stays "Łukasz" (no decomposition exists).
 */
export function stripDiacritics(text: string): string {
  return text.normalize('NFD').replace(/\p{Mn}/gu, '');
}
