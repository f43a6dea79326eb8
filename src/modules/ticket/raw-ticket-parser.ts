import type { RawField } from '../../domain/models/user-record.model';

export const DEFAULT_HEADER_MARKER = '###';

/**
 * Joins the lines of a multi-line value. Lines were split on line breaks, so
 * the separator never occurs inside a single line and list-valued fields keep
 * their item boundaries.
 */
export const LIST_SEPARATOR = '\n';

export interface RawTicketParserOptions {
  /** Prefix that introduces a field label on its own line. */
  headerMarker?: string;
}

/**
 * Split a ticket body into `(label, value)` pairs.
 *
 * - Lines are trimmed and blank lines dropped.
 * - A line starting with the header marker opens a new field; the label is the
 *   rest of the line.
 * - Every other line continues the current field. Lines before the first
 *   header have no field and are ignored.
 * - A header with no continuation lines yields an empty value.
 *
 * One entry is produced per header line, in ticket order.
 */
export function parseRawTicket(text: string, options: RawTicketParserOptions = {}): RawField[] {
  const marker = options.headerMarker ?? DEFAULT_HEADER_MARKER;
  const fields: Array<{ name: string; lines: string[] }> = [];
  let current: { name: string; lines: string[] } | undefined;

  for (const line of text.split(/\r\n|\r|\n/).map((l) => l.trim())) {
    if (line.length === 0) continue;

    if (line.startsWith(marker)) {
      current = { name: line.slice(marker.length).trim(), lines: [] };
      fields.push(current);
    } else if (current) {
      current.lines.push(line);
    }
  }

  return fields.map((f) => ({ name: f.name, rawValue: f.lines.join(LIST_SEPARATOR) }));
}
