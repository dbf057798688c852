/**
 * Company Name and Number Helpers
 *
 * Shared by the normalizer, the offender resolver and the duplicate
 * detector so all three agree on what "the same name" means.
 */
import type { BusinessType } from "../types/record.types";

/**
 * Normalize an organization name for exact and fuzzy matching.
 *
 * "ACME Limited" and "Acme Ltd." both become "acme ltd".
 */
export function normalizeCompanyName(name: string): string {
  return name
    .toLowerCase()
    .replace(/\bpublic limited company\b/g, "plc")
    .replace(/\bp\.l\.c\.?/g, "plc")
    .replace(/[.,:;!?@#$%^*()'"`]+/g, "")
    .replace(/\blimited\b/g, "ltd")
    .replace(/\bcompany\b/g, "co")
    .replace(/\band\b/g, "&")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Clean a Companies House number.
 * Strips link decorations, upper-cases and left-pads numeric ids to 8 digits.
 * Returns null when the result is not an 8-character registry number.
 */
export function cleanCompanyNumber(value: string | null | undefined): string | null {
  if (!value) return null;
  let cleaned = value
    .replace(/\(opens in new tab\)/gi, "")
    .replace(/\s+/g, "")
    .toUpperCase();

  if (/^\d{1,7}$/.test(cleaned)) {
    cleaned = cleaned.padStart(8, "0");
  }

  return /^[A-Z0-9]{8}$/.test(cleaned) ? cleaned : null;
}

/** Pull a UK postcode out of free-text address, normalized to "OUT IN" */
export function extractPostcode(address: string | null | undefined): string | null {
  if (!address) return null;
  const match = address.toUpperCase().match(/([A-Z]{1,2}\d[A-Z\d]?\s*\d[A-Z]{2})/);
  if (!match) return null;
  const compact = match[1].replace(/\s+/g, "");
  return `${compact.slice(0, -3)} ${compact.slice(-3)}`;
}

export function detectBusinessType(name: string | null | undefined): BusinessType {
  if (!name) return "other";
  if (/\bLimited\b|\bLtd\.?(?=\s|$)/i.test(name)) return "limited_company";
  if (/\bPLC\b/i.test(name)) return "plc";
  if (/\bLLP\b/i.test(name)) return "llp";
  if (/\bLLC\b|\bInc\.?(?=\s|$)|\bIncorporated\b|\bCorp\.?(?=\s|$)|\bCorporation\b/i.test(name)) {
    return "limited_company";
  }
  if (/\bpartners(hip)?\b|\s&\s+sons?\b/i.test(name)) return "partnership";
  if (/\bt\/a\b|\btrading as\b/i.test(name)) return "sole_trader";
  return "other";
}

/** Unique key offenders are inserted under: normalized name plus postcode */
export function offenderIdentityKey(name: string, postcode: string | null): string {
  const normalizedPostcode = postcode ? postcode.replace(/\s+/g, "").toUpperCase() : "";
  return `${normalizeCompanyName(name)}|${normalizedPostcode}`;
}
