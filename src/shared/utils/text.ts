/**
 * Text Cleaning Helpers
 *
 * Scraped cells carry non-breaking spaces, newlines and placeholder dashes.
 */

/** Collapse whitespace; empty strings and lone dashes become null */
export function cleanText(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const cleaned = value.replace(/ /g, " ").replace(/\s+/g, " ").trim();
  if (cleaned === "" || cleaned === "-") return null;
  return cleaned;
}

/** "FIELD OPERATIONS DIRECTORATE" → "Field Operations Directorate" */
export function toTitleCase(value: string): string {
  return value
    .toLowerCase()
    .split(" ")
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1) : word))
    .join(" ");
}

/**
 * Parse a money amount such as "£12,500.00".
 * Currency symbols, separators and whitespace are stripped; anything
 * unparsable is 0.
 */
export function parseMoney(value: string | null | undefined): number {
  if (!value) return 0;
  const stripped = value.replace(/[£$€,\s]/g, "");
  const match = stripped.match(/\d+(\.\d+)?/);
  if (!match) return 0;
  const amount = parseFloat(match[0]);
  return Number.isFinite(amount) ? amount : 0;
}

/** Make an href absolute against the page it came from */
export function absoluteUrl(href: string, base: string): string | null {
  try {
    return new URL(href, base).toString();
  } catch {
    return null;
  }
}
