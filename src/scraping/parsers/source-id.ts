/**
 * Source Id Derivation
 *
 * A record's source id comes from its detail URL: the EA registration
 * number, the HSE `SV` query value, or a short URL hash as a last resort.
 */
import type { AgencyCode } from "../../shared/types/record.types";
import { urlSourceId } from "../../shared/utils/hash";

export function deriveSourceId(agency: AgencyCode, detailUrl: string): string {
  if (agency === "ea") {
    const match = detailUrl.match(/registration\/(\d+)/);
    if (match) return match[1];
  } else {
    try {
      const id = new URL(detailUrl).searchParams.get("SV");
      if (id && id.trim() !== "") return id.trim();
    } catch {
      return urlSourceId(detailUrl);
    }
  }
  return urlSourceId(detailUrl);
}

/** Drop repeated source ids, keeping the first occurrence */
export function uniqueBySourceId<T extends { sourceId: string }>(records: T[]): T[] {
  const seen = new Set<string>();
  return records.filter((record) => {
    if (seen.has(record.sourceId)) return false;
    seen.add(record.sourceId);
    return true;
  });
}
