/**
 * Allow-list wire format: one `address alias` pair per line, `#` starts a
 * comment, blank lines are skipped.
 */

import { ParseError } from "../errors.js";

/** address -> alias */
export type AllowedAddresses = Record<string, string>;

export interface AllowedEntry {
  address: string;
  alias: string;
}

/**
 * Parse `get_allowed` output.
 *
 * An address with no alias maps to "". A later line for the same address
 * replaces the earlier one.
 */
export function parseAllowedAddresses(text: string): AllowedAddresses {
  const result: AllowedAddresses = {};
  for (const line of text.split("\n")) {
    const content = (line.split("#")[0] ?? "").trim();
    if (!content) {continue;}

    const [address = "", ...rest] = content.split(/\s+/);
    result[address] = rest.join(" ");
  }
  return result;
}

/**
 * Parse a user-supplied allow-list file, which must give an alias on every
 * line.
 *
 * @throws ParseError naming the first line without an alias.
 */
export function parseAllowedEntries(text: string): AllowedEntry[] {
  const entries: AllowedEntry[] = [];
  const lines = text.split("\n");
  lines.forEach((line, index) => {
    const content = (line.split("#")[0] ?? "").trim();
    if (!content) {return;}

    const match = content.match(/^(\S+)\s+(.+)$/);
    if (!match?.[1] || !match[2]) {
      throw new ParseError(`Line ${index + 1}: expected '<address> <alias>'`, line);
    }
    entries.push({ address: match[1], alias: match[2].trim() });
  });
  return entries;
}

/**
 * Encode entries for `update_allowed_batch` stdin, newline-terminated.
 */
export function formatAllowedBatch(entries: readonly AllowedEntry[]): string {
  return entries.map((e) => `${e.address} ${e.alias}`).join("\n") + "\n";
}
